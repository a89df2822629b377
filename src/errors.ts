export class CrudError extends Error {
  override readonly name: string = 'CrudError';

  constructor(message: string) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Zero records matched a lookup that expected exactly one. */
export class NotFoundError extends CrudError {
  override readonly name = 'NotFoundError';

  constructor(
    readonly table: string,
    message?: string,
  ) {
    super(message ?? `No record found in "${table}"`);
  }
}

/** More than one record matched a lookup that expected exactly one. */
export class MultipleResultsError extends CrudError {
  override readonly name = 'MultipleResultsError';

  constructor(
    readonly table: string,
    message?: string,
  ) {
    super(message ?? `Multiple records found in "${table}"`);
  }
}

/** Any failure reported by the database, wrapped with the operation that issued it. */
export class ExecutionError extends CrudError {
  override readonly name = 'ExecutionError';

  constructor(
    readonly operation: string,
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
  }
}

export class MissingPrimaryKeyError extends CrudError {
  override readonly name = 'MissingPrimaryKeyError';

  constructor(
    readonly operation: string,
    readonly table: string,
  ) {
    super(`${operation} on "${table}" requires a non-zero primary key`);
  }
}

export class EntityDefinitionError extends CrudError {
  override readonly name = 'EntityDefinitionError';
}
