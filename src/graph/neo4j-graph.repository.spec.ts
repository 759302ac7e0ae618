import { isConnectionLoss } from './neo4j-graph.repository';

function driverError(code: string): Error {
  return Object.assign(new Error('driver failure'), { code });
}

describe('isConnectionLoss', () => {
  it('matches the driver codes of an unreachable server', () => {
    expect(isConnectionLoss(driverError('ServiceUnavailable'))).toBe(true);
    expect(isConnectionLoss(driverError('SessionExpired'))).toBe(true);
  });

  it('leaves query and transient errors to the retry policy', () => {
    expect(isConnectionLoss(driverError('Neo.TransientError.Transaction.DeadlockDetected'))).toBe(
      false,
    );
    expect(isConnectionLoss(new Error('ServiceUnavailable'))).toBe(false);
    expect(isConnectionLoss({ code: 'ServiceUnavailable' })).toBe(false);
  });
});
