export class TripReportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TripReportError';
  }
}

export class TripRootNotFoundError extends TripReportError {
  public readonly rootPath: string;

  constructor(rootPath: string) {
    super(`Trip directory does not exist: ${rootPath}`);
    this.name = 'TripRootNotFoundError';
    this.rootPath = rootPath;
  }
}

export class TripRootNotDirectoryError extends TripReportError {
  public readonly rootPath: string;

  constructor(rootPath: string) {
    super(`Trip path is not a directory: ${rootPath}`);
    this.name = 'TripRootNotDirectoryError';
    this.rootPath = rootPath;
  }
}

export class HierarchyDeserializationError extends TripReportError {
  /** Location of the offending value, e.g. `trip.sites[0].pucks[1].name`. */
  public readonly jsonPath: string;

  constructor(jsonPath: string, detail: string) {
    super(`Invalid hierarchy JSON at ${jsonPath}: ${detail}`);
    this.name = 'HierarchyDeserializationError';
    this.jsonPath = jsonPath;
  }
}
