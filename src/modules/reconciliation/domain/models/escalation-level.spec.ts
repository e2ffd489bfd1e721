import { escalationLevelFor, missedHeartbeatsSince } from './escalation-level';

describe('escalation level', () => {
  it.each([
    [0, null],
    [1, 'first_miss'],
    [2, 'second_miss'],
    [3, 'multiple_misses'],
    [4, 'multiple_misses'],
    [5, 'extended_failure'],
    [12, 'extended_failure'],
  ])('should map %i missed heartbeats to %s', (missed, level) => {
    expect(escalationLevelFor(missed)).toBe(level);
  });

  it('should count whole fifteen-minute intervals since the last heartbeat', () => {
    const last = new Date('2025-03-10T09:00:00.000Z');

    expect(missedHeartbeatsSince(last, new Date('2025-03-10T09:14:59.000Z'))).toBe(0);
    expect(missedHeartbeatsSince(last, new Date('2025-03-10T09:21:00.000Z'))).toBe(1);
    expect(missedHeartbeatsSince(last, new Date('2025-03-10T09:42:00.000Z'))).toBe(2);
    expect(missedHeartbeatsSince(last, new Date('2025-03-10T08:00:00.000Z'))).toBe(0);
  });
});
