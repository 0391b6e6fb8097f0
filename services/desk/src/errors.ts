/** Raised when the tool server cannot be reached or its reply cannot be decoded. */
export class McpTransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'McpTransportError';
  }
}

/** A JSON-RPC `error` member returned by the tool server. */
export class McpToolError extends Error {
  readonly code: number;
  /** The server's message, without the client prefix. */
  readonly detail: string;

  constructor(code: number, message: string) {
    super(`MCP Error: ${message}`);
    this.name = 'McpToolError';
    this.code = code;
    this.detail = message;
  }
}

/** An agent-to-agent hop failed, timed out or answered with a non-2xx status. */
export class AgentTransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AgentTransportError';
  }
}

/** A reply envelope or its payload did not match the expected schema. */
export class AgentProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AgentProtocolError';
  }
}

/** A step a coordination protocol cannot continue without came back unsuccessful. */
export class CoordinationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CoordinationError';
  }
}

/** A run re-entered its protocols more often than the router allows. */
export class IterationLimitError extends Error {
  constructor() {
    super('Maximum iterations reached');
    this.name = 'IterationLimitError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
