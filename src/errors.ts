/**
 * Startup-time failure: the config or registry source is missing or
 * malformed. The only error allowed to cross a public boundary; every
 * runtime failure is a Result or a returned string instead.
 */
export class ConfigurationError extends Error {
  readonly source: string;

  constructor(message: string, source: string) {
    super(message);
    this.name = "ConfigurationError";
    this.source = source;
  }
}
