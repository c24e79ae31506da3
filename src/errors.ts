export class TranscodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid arguments or an unusable format pair; raised before any job exists. */
export class ConfigurationError extends TranscodeError {}

/** The input path is missing or is neither a file nor a folder. */
export class DiscoveryError extends TranscodeError {
  constructor(
    message: string,
    readonly inpath: string,
  ) {
    super(message);
  }
}

/** Discovery succeeded but nothing matched the source format. */
export class EmptyDiscoveryError extends TranscodeError {
  constructor(
    readonly inpath: string,
    readonly extension: string,
  ) {
    super(`No ${extension} files found in ${inpath}`);
  }
}
