function describeIdentity(identity: number | undefined): string {
  return identity === undefined ? 'no id' : `id ${identity}`;
}

export class StateNotFoundError extends Error {
  override readonly name = 'StateNotFoundError';

  constructor(
    readonly typeName: string,
    readonly details: {
      identity?: number;
      filters?: Readonly<Record<string, unknown>>;
      matchCount?: number;
    } = {},
    message?: string,
  ) {
    super(message ?? StateNotFoundError.defaultMessage(typeName, details));
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  private static defaultMessage(
    typeName: string,
    details: { identity?: number; filters?: Readonly<Record<string, unknown>>; matchCount?: number },
  ): string {
    if (details.filters !== undefined) {
      return `Object not found with name '${typeName}' and properties ${JSON.stringify(details.filters)}`;
    }
    const found = details.matchCount === undefined ? '' : ` (backend returned ${details.matchCount} matches)`;
    return `State not found for class '${typeName}' with ${describeIdentity(details.identity)}${found}`;
  }
}

export class WaitTimeoutError extends Error {
  override readonly name = 'WaitTimeoutError';

  constructor(
    readonly typeName: string,
    readonly propertyName: string,
    readonly timeoutMs: number,
    readonly mismatch: string,
  ) {
    super(
      `After ${(timeoutMs / 1000).toFixed(1)} seconds test on ${typeName}.${propertyName} failed: ${mismatch}`,
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class AttributeNotFoundError extends Error {
  override readonly name = 'AttributeNotFoundError';

  constructor(
    readonly typeName: string,
    readonly attributeName: string,
  ) {
    super(`Class '${typeName}' has no attribute '${attributeName}'`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PropertyTypeError extends Error {
  override readonly name = 'PropertyTypeError';

  constructor(
    readonly typeName: string,
    readonly attributeName: string,
    readonly expectedKind: string,
    readonly actualKind: string,
  ) {
    super(`Attribute '${attributeName}' of '${typeName}' is a ${actualKind}, not a ${expectedKind}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ArgumentError extends Error {
  override readonly name = 'ArgumentError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidQueryError extends Error {
  override readonly name = 'InvalidQueryError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TooManyResultsError extends Error {
  override readonly name = 'TooManyResultsError';

  constructor(
    readonly query: string,
    readonly count: number,
  ) {
    super(`More than one item was returned for query '${query}' (${count} items)`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnboundValueError extends Error {
  override readonly name = 'UnboundValueError';

  constructor() {
    super('This value was not constructed as part of an object. The waitFor method cannot be used.');
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ProxyRegistrationError extends Error {
  override readonly name = 'ProxyRegistrationError';

  constructor(
    readonly backendKey: string,
    readonly typeName: string,
  ) {
    super(`A different proxy class is already registered for '${typeName}' on backend '${backendKey}'`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownSearchParameterError extends Error {
  override readonly name = 'UnknownSearchParameterError';

  constructor(
    readonly parameter: string,
    readonly knownParameters: readonly string[],
  ) {
    super(
      `Search parameter '${parameter}' doesn't have a corresponding filter in [${knownParameters.join(', ')}]`,
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConnectionSearchError extends Error {
  override readonly name = 'ConnectionSearchError';

  constructor(
    readonly criteria: Readonly<Record<string, unknown>>,
    readonly matchCount: number,
  ) {
    super(
      matchCount === 0
        ? `Search criteria ${JSON.stringify(criteria)} returned no results`
        : `Search criteria ${JSON.stringify(criteria)} returned ${matchCount} results, expected exactly one`,
    );
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class BackendError extends Error {
  override readonly name = 'BackendError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
