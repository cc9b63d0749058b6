export class MalformedEventError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedEventError";
  }
}

/** Raised on the create path when a recognized device class has no model identifier. */
export class MissingModelError extends Error {
  constructor(public readonly deviceClass: string) {
    super(`No model identifier configured for device class "${deviceClass}"`);
    this.name = "MissingModelError";
  }
}

export class TwinStoreError extends Error {
  constructor(
    public readonly twinId: string,
    public readonly detail: string,
  ) {
    super(`Twin store rejected '${twinId}': ${detail}`);
    this.name = "TwinStoreError";
  }
}

export class PatchTargetMissingError extends Error {
  constructor(public readonly path: string) {
    super(`Patch target does not exist: ${path}`);
    this.name = "PatchTargetMissingError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
