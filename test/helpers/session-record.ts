import { SessionRecord } from '@/session/interfaces/session.interface';

export function makeSessionRecord(sessionId: string, at: Date = new Date(Date.UTC(2024, 0, 1))): SessionRecord {
  return {
    sessionId,
    createdAt: at,
    updatedAt: at,
    lastAccessed: at,
    metadata: {},
    userInfo: {},
    facts: {},
    topics: [],
    messagesMetadata: [],
    enrichment: {},
  };
}
