export interface RatingCurveEntry {
  d: number; // gate opening, ft
  C: number; // coefficient of discharge
}

export interface RatingCurveMatch {
  requested: number;
  d: number;
  coefficient: number;
  exact: boolean;
}
