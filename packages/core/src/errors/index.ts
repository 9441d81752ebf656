export class DatabaseError extends Error {
  constructor(message: string, public code?: string, public override cause?: Error) {
    super(message);
    this.name = 'DatabaseError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class NestedTxError extends DatabaseError {
  constructor(message: string, public override code?: string, public override cause?: Error) {
    super(message, code, cause);
    this.name = 'NestedTxError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Operation is invalid for the transaction's current state: double begin,
 * commit with open nested scopes, resolving an already resolved scope.
 */
export class TransactionStateError extends NestedTxError {
  constructor(message: string, public transactionId?: string, cause?: Error) {
    super(message, 'TRANSACTION_STATE_ERROR', cause);
    this.name = 'TransactionStateError';
  }
}

/**
 * A savepoint was resolved while it was not the top of its transaction's stack.
 */
export class OutOfOrderResolutionError extends NestedTxError {
  constructor(message: string, public savepoint?: string, public top?: string) {
    super(message, 'OUT_OF_ORDER_RESOLUTION');
    this.name = 'OutOfOrderResolutionError';
  }
}

/**
 * A savepoint was resolved after an ancestor's rollback invalidated it.
 */
export class StaleSavepointError extends NestedTxError {
  constructor(message: string, public savepoint?: string) {
    super(message, 'STALE_SAVEPOINT');
    this.name = 'StaleSavepointError';
  }
}

/**
 * The server ended the transaction with a rollback instead of the requested
 * commit, as PostgreSQL does for a transaction already in a failed state.
 */
export class TransactionAbortedError extends NestedTxError {
  constructor(message: string, cause?: Error) {
    super(message, 'TRANSACTION_ABORTED', cause);
    this.name = 'TransactionAbortedError';
  }
}

export class SessionStateError extends NestedTxError {
  constructor(message: string, cause?: Error) {
    super(message, 'SESSION_STATE_ERROR', cause);
    this.name = 'SessionStateError';
  }
}

export class ConnectionError extends NestedTxError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONNECTION_ERROR', cause);
    this.name = 'ConnectionError';
  }
}

export class ValidationError extends NestedTxError {
  constructor(message: string, public field?: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

export class NotImplementedError extends NestedTxError {
  constructor(feature: string) {
    super(`Feature "${feature}" is not implemented`, 'NOT_IMPLEMENTED');
    this.name = 'NotImplementedError';
  }
}
