import {groupBy, mean, round, sortBy} from 'lodash';
import {Observation} from '../observation/observation.interface';
import {FlowRecord, DuplicateTimestamp, DuplicatePolicy, FlowSeries} from './flow-record.interface';
import {logger} from '../../utils/logger';


export function pairObservationsWithFlows(observations: Observation[], flows: number[]): FlowRecord[] {

  if (observations.length !== flows.length) {
    throw new Error(`Expected a flow for each of the ${observations.length} observations, got ${flows.length}.`);
  }

  return observations.map((observation, idx): FlowRecord => ({
    timestamp: observation.timestamp,
    totalFlow: flows[idx],
    rowNumbers: [observation.rowNumber]
  }));

}


// Expects records already sorted by time. Each repeated timestamp is reported once.
export function findDuplicateTimestamps(records: FlowRecord[]): DuplicateTimestamp[] {

  const groups = groupBy(records, (record) => record.timestamp.getTime());

  return sortBy(Object.values(groups), (group) => group[0].timestamp.getTime())
  .filter((group) => group.length > 1)
  .map((group): DuplicateTimestamp => ({
    timestamp: group[0].timestamp,
    rowNumbers: group.flatMap((record) => record.rowNumbers),
    flows: group.map((record) => record.totalFlow)
  }));

}


function resolveGroup(group: FlowRecord[], policy: DuplicatePolicy): FlowRecord {

  if (group.length === 1) {
    return group[0];
  }

  const rowNumbers = group.flatMap((record) => record.rowNumbers);

  switch (policy) {
    case 'first':
      return {...group[0], rowNumbers};
    case 'last':
      return {...group[group.length - 1], rowNumbers};
    case 'mean':
      return {
        timestamp: group[0].timestamp,
        totalFlow: round(mean(group.map((record) => record.totalFlow)), 2),
        rowNumbers
      };
  }

}


// Sorting is stable, so records sharing a timestamp stay in the order they were logged, which is what 'first' and 'last' rely on.
export function assembleFlowSeries(observations: Observation[], flows: number[], policy: DuplicatePolicy = 'last'): FlowSeries {

  const sorted = sortBy(pairObservationsWithFlows(observations, flows), (record) => record.timestamp.getTime());
  const duplicates = findDuplicateTimestamps(sorted);

  duplicates.forEach((duplicate): void => {
    logger.warn({rowNumbers: duplicate.rowNumbers, flows: duplicate.flows}, `Duplicate timestamp ${duplicate.timestamp.toISOString()}, resolving using the '${policy}' policy.`);
  });

  const records: FlowRecord[] = [];
  let group: FlowRecord[] = [];

  sorted.forEach((record): void => {
    if (group.length > 0 && group[0].timestamp.getTime() !== record.timestamp.getTime()) {
      records.push(resolveGroup(group, policy));
      group = [];
    }
    group.push(record);
  });
  if (group.length > 0) {
    records.push(resolveGroup(group, policy));
  }

  return {records, duplicates, policy};

}
