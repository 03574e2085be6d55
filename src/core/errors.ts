export class MindgateError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'MindgateError';
  }
}

export class ConfigError extends MindgateError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export type ProviderFailureKind = 'service-unavailable' | 'rate-limited';

export class ProviderError extends MindgateError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly kind: ProviderFailureKind,
    cause?: Error,
  ) {
    super(message, kind === 'rate-limited' ? 'RATE_LIMITED' : 'SERVICE_UNAVAILABLE', undefined, cause);
    this.name = 'ProviderError';
  }
}

export class KnowledgeError extends MindgateError {
  constructor(message: string, cause?: Error) {
    super(message, 'KNOWLEDGE_ERROR', 'research', cause);
    this.name = 'KnowledgeError';
  }
}

export class MemoryError extends MindgateError {
  constructor(message: string, cause?: Error) {
    super(message, 'MEMORY_ERROR', 'memory', cause);
    this.name = 'MemoryError';
  }
}

export class ExecutorError extends MindgateError {
  constructor(message: string, public readonly actionId: string, cause?: Error) {
    super(message, 'EXECUTOR_ERROR', 'code', cause);
    this.name = 'ExecutorError';
  }
}

export class GateViolationError extends MindgateError {
  constructor(message: string, public readonly actionId?: string) {
    super(message, 'simulation-gate-violation', 'code');
    this.name = 'GateViolationError';
  }
}

export class StageTimeoutError extends MindgateError {
  constructor(stage: string, public readonly timeoutMs: number) {
    super(`Stage "${stage}" timed out after ${timeoutMs}ms`, 'stage-timeout', stage);
    this.name = 'StageTimeoutError';
  }
}

export class RunCancelledError extends MindgateError {
  constructor(public readonly runId: string, stage?: string) {
    super(`Run ${runId} was cancelled`, 'cancelled', stage);
    this.name = 'RunCancelledError';
  }
}

/** Normalise an unknown thrown value. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
