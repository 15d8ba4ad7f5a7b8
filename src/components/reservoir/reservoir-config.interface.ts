import {GateLogLayout} from '../gate-log/gate-log-layout.interface';
import {PathnameParts} from '../timeseries/timeseries-payload.interface';

export interface ReservoirGateLog extends GateLogLayout {
  skipRows: number; // title line(s) above the Date/Time header
}

export interface ReservoirConfig {
  name: string;
  spillwayInvertElevation: number; // ft
  gateLength: number; // ft
  gateLog: ReservoirGateLog;
  ratingCurve: {
    skipRows: number; // title block above the d/C header
  };
  pathname: PathnameParts;
}
