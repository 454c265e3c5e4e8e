import type { LogEntry, LogEntryType, SocialGameState } from '../../types/social.js';

export function appendLog(
  state: SocialGameState,
  type: LogEntryType,
  payload: LogEntry['payload'],
  playerId?: string,
): LogEntry {
  state.sequence += 1;
  const entry: LogEntry = { seq: state.sequence, type, payload };
  if (playerId !== undefined) entry.playerId = playerId;
  state.log.push(entry);
  return entry;
}
