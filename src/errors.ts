export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class UnsupportedIoUTypeError extends ConfigurationError {
  readonly iouType: string;

  constructor(iouType: string) {
    super(`Unknown iou type ${iouType}, only "bbox" evaluation is supported`);
    this.name = 'UnsupportedIoUTypeError';
    this.iouType = iouType;
  }
}

/**
 * Raised when a caller hands the engine malformed input: arrays of differing
 * lengths, repeated image ids inside one batch, labels outside the category
 * index and the like.
 */
export class InputContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputContractError';
  }
}
