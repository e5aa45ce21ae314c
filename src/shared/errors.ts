export const UNKNOWN_ACTIVITY_MESSAGE = "Неизвестная тренировка.";
export const INVALID_PACKAGE_MESSAGE = "Некорректный пакет данных.";

/**
 * Base class for errors raised while reading a sensor package
 */
export class TrackerError extends Error {
  constructor(message: string, public readonly tag: string) {
    super(message);
    this.name = "TrackerError";
  }
}

export class UnknownActivityError extends TrackerError {
  constructor(tag: string) {
    super(UNKNOWN_ACTIVITY_MESSAGE, tag);
    this.name = "UnknownActivityError";
  }
}

/**
 * Raised for a package with a missing value, the wrong number of values,
 * or a value outside its field's range. `reason` is meant for logs.
 */
export class InvalidPackageError extends TrackerError {
  constructor(tag: string, public readonly reason: string) {
    super(INVALID_PACKAGE_MESSAGE, tag);
    this.name = "InvalidPackageError";
  }
}
