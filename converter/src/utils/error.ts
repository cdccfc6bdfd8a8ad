/// Throws, usable where an expression is expected: `value ?? error("...")`
export let error = (message: string | Error): never => {
  if (message instanceof Error) {
    throw message;
  } else {
    throw new Error(message);
  }
};

export class IndexOutOfBoundsError extends RangeError {
  index: number | string;
  constructor({ index, bounds }: { index: number | string; bounds: string }) {
    super(`Index ${index} out of bounds (${bounds})`);
    this.name = "IndexOutOfBoundsError";
    this.index = index;
  }
}

/// Value can't be represented (negative, fractional or above the maximum)
export class InvalidValueError extends RangeError {
  value: number;
  constructor({ value, reason }: { value: number; reason: string }) {
    super(`Invalid value ${value}: ${reason}`);
    this.name = "InvalidValueError";
    this.value = value;
  }
}

export class PaletteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PaletteError";
  }
}
