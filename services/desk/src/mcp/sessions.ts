import { randomUUID } from 'crypto';
import type { JsonRpcResponse } from '../contracts/jsonrpc';

export interface McpSession {
  id: string;
  createdAt: string;
  messages: JsonRpcResponse[];
}

/**
 * Session table for the tool server. Each session keeps a bounded queue of the
 * responses it was sent so `GET /mcp` can replay them.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, McpSession>();

  constructor(private readonly maxQueued = 100) {}

  /** Returns the session for `id`, creating it (and issuing an id when absent). */
  resolve(id?: string): McpSession {
    const sessionId = id && id.trim() ? id.trim() : randomUUID();
    let session = this.sessions.get(sessionId);
    if (!session) {
      session = { id: sessionId, createdAt: new Date().toISOString(), messages: [] };
      this.sessions.set(sessionId, session);
    }
    return session;
  }

  enqueue(session: McpSession, message: JsonRpcResponse): void {
    session.messages.push(message);
    if (session.messages.length > this.maxQueued) {
      session.messages.splice(0, session.messages.length - this.maxQueued);
    }
  }

  drain(session: McpSession): JsonRpcResponse[] {
    return session.messages.splice(0, session.messages.length);
  }

  get size(): number {
    return this.sessions.size;
  }
}
