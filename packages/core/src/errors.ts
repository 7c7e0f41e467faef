import type { IMap2DError } from '@map2d/types/errors';

export class Map2DError extends Error {
  baseMessage: string;
  contextMessage?: string;

  // Fallback property for checking if an error is a Map2DError
  readonly __isMap2DError = true;

  constructor(contextMessage?: string, options?: ErrorOptions) {
    super(undefined, options);
    this.name = 'Map2DError';
    this.baseMessage = 'Map2D Error';
    this.contextMessage = contextMessage;
  }

  get message(): string {
    if (this.contextMessage)
      return `${this.baseMessage} | Context: ${this.contextMessage}`;
    return this.baseMessage;
  }

  toString() {
    return JSON.stringify(this.toJSON());
  }

  toJSON(): IMap2DError {
    return {
      name: this.name,
      message: this.message,
      baseMessage: this.baseMessage,
      contextMessage: this.contextMessage,
    };
  }

  static fromJson(json: Partial<IMap2DError>) {
    const error = new Map2DError(json.contextMessage);
    if (json.baseMessage) error.baseMessage = json.baseMessage;
    if (json.name) error.name = json.name;
    return error;
  }
}

export function isMap2DError(error: unknown): error is Map2DError {
  return (
    error instanceof Map2DError ||
    (typeof error === 'object' &&
      error !== null &&
      '__isMap2DError' in error &&
      error.__isMap2DError === true)
  );
}

export class InvalidKeyError extends Map2DError {
  constructor(part: 'row' | 'column', key: unknown, contextMessage?: string) {
    super(contextMessage);
    this.name = 'InvalidKeyError';
    this.baseMessage = `Row and column keys cannot be null or undefined. The ${part} key was: ${String(key)}`;
  }
}

export class UnencodableKeyError extends Map2DError {
  constructor(description: string, contextMessage?: string) {
    super(contextMessage);
    this.name = 'UnencodableKeyError';
    this.baseMessage = `A key contains a value that cannot be compared by value. Keys may only contain strings, numbers, bigints, booleans, null, dates, arrays, maps, sets, objects, Hashable instances and class instances with enumerable properties. Found: ${description}`;
  }
}
