/**
 * Thrown when the resource directory, or one of the assets declared under it,
 * is not on disk at registration time.
 */
export class ResourceDirectoryNotFoundError extends Error {
  /**
   * The absolute path that was expected to exist.
   */
  public readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message);
    this.name = 'ResourceDirectoryNotFoundError';
    this.path = path;
    this.cause = cause;
  }
}

/**
 * Thrown by a registry using the `"reject"` policy when a package name is
 * already taken.
 */
export class DuplicateRegistrationError extends Error {
  public readonly packageName: string;

  constructor(message: string, packageName: string) {
    super(message);
    this.name = 'DuplicateRegistrationError';
    this.packageName = packageName;
  }
}

/**
 * A package or resource descriptor failed schema validation.
 */
export class InvalidPackageDescriptorError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'InvalidPackageDescriptorError';
    this.cause = cause;
  }
}
