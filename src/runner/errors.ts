/**
 * Raised when a `{{var}}` placeholder has no binding in the case it is rendered for.
 * Fatal to the case; the provider is never called.
 */
export class TemplateError extends Error {
  constructor(
    public readonly variable: string,
    public readonly template: string
  ) {
    super(`Undefined template variable: ${variable}`);
    this.name = 'TemplateError';
  }
}

/**
 * Raised when a bulk data source cannot be read or is malformed.
 * Fatal to the whole test definition.
 */
export class DataSourceError extends Error {
  constructor(
    public readonly source: string,
    message: string
  ) {
    super(`Cases file ${source}: ${message}`);
    this.name = 'DataSourceError';
  }
}

/**
 * A configuration mistake: invalid regex, non-numeric bound, unknown provider.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path?: string
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

export class SnapshotStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SnapshotStoreError';
  }
}

/**
 * Suite file could not be read, parsed or matched against the schema.
 */
export class SuiteLoadError extends Error {
  readonly issues: string[];
  readonly filePath: string;
  /** File content, kept when the YAML itself did not parse */
  readonly source?: string;

  constructor(filePath: string, issues: string[], source?: string) {
    const lines = issues.map((issue, i) => `  [${i + 1}] ${issue}`).join('\n');
    super(`Failed to load suite ${filePath} with ${issues.length} issue(s):\n${lines}`);
    this.name = 'SuiteLoadError';
    this.filePath = filePath;
    this.issues = issues;
    this.source = source;
  }

  get firstIssue(): string | undefined {
    return this.issues[0];
  }
}
