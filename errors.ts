export type FaultKind =
  | 'DataUnavailable'
  | 'UnknownSymbol'
  | 'ArithmeticFault'
  | 'RiskBreach'
  | 'ExecutionError';

export class EngineError extends Error {
  readonly kind: FaultKind;
  readonly symbol?: string;

  constructor(kind: FaultKind, message: string, symbol?: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.symbol = symbol;
  }
}

export class DataUnavailableError extends EngineError {
  constructor(symbol: string, message: string) {
    super('DataUnavailable', message, symbol);
  }
}

export class UnknownSymbolError extends EngineError {
  constructor(symbol: string) {
    super('UnknownSymbol', `No trading rule for ${symbol}`, symbol);
  }
}

export class ArithmeticFaultError extends EngineError {
  constructor(symbol: string, message: string) {
    super('ArithmeticFault', message, symbol);
  }
}

export class ExecutionError extends EngineError {
  constructor(symbol: string, message: string) {
    super('ExecutionError', message, symbol);
  }
}

export interface SymbolFault {
  symbol: string;
  kind: FaultKind;
  message: string;
}

export type SymbolResult<T> =
  | { ok: true; symbol: string; value: T }
  | { ok: false; symbol: string; fault: SymbolFault };

/**
 * Converts anything thrown while handling one symbol into a tagged fault.
 * Errors outside the taxonomy are filed under `fallback`.
 */
export function toFault(symbol: string, error: unknown, fallback: FaultKind): SymbolFault {
  if (error instanceof EngineError) {
    return { symbol, kind: error.kind, message: error.message };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { symbol, kind: fallback, message };
}
