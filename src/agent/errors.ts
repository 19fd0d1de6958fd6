/**
 * Error taxonomy for the roaming agent.
 *
 * Every failure carries a stable `code`. Query-scoped errors abort only the
 * query in progress; session-level errors mean the tool session or the
 * configuration itself is unusable.
 */

export class RoamingAgentError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'RoamingAgentError';
  }
}

/** The tool session could not enumerate its tools, or returned a malformed catalog. */
export class ToolListingError extends RoamingAgentError {
  constructor(message: string, cause?: unknown) {
    super(message, 'TOOL_LISTING_ERROR', cause);
    this.name = 'ToolListingError';
  }
}

/** A specific tool call failed on the session side. */
export class ToolInvocationError extends RoamingAgentError {
  constructor(
    message: string,
    public readonly toolName: string,
    public readonly args: Readonly<Record<string, unknown>>,
    cause?: unknown,
  ) {
    super(message, 'TOOL_INVOCATION_ERROR', cause);
    this.name = 'ToolInvocationError';
  }
}

/** A tool result without content reached the message model. Programming error. */
export class MalformedToolResultError extends RoamingAgentError {
  constructor(
    message: string,
    public readonly toolUseId: string,
  ) {
    super(message, 'MALFORMED_TOOL_RESULT');
    this.name = 'MalformedToolResultError';
  }
}

export class ProviderError extends RoamingAgentError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, 'PROVIDER_ERROR', cause);
    this.name = 'ProviderError';
  }
}

export class ConfigError extends RoamingAgentError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

/** The tool session transport is gone; pending and future requests fail. */
export class ToolSessionClosedError extends RoamingAgentError {
  constructor(message = 'Tool session is closed', cause?: unknown) {
    super(message, 'TOOL_SESSION_CLOSED', cause);
    this.name = 'ToolSessionClosedError';
  }
}

export class JsonRpcError extends RoamingAgentError {
  constructor(
    message: string,
    public readonly rpcCode: number,
    public readonly data?: unknown,
  ) {
    super(message, 'JSON_RPC_ERROR');
    this.name = 'JsonRpcError';
  }
}

/**
 * True for failures that abort only the current query. Anything else
 * (closed session, bad configuration, unknown throwables) affects every
 * later query as well.
 */
export function isQueryScopedError(err: unknown): boolean {
  if (err instanceof ToolSessionClosedError || err instanceof ConfigError) return false;
  return err instanceof RoamingAgentError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
