/**
 * Failures raised while turning text into pages. Each one aborts the run;
 * entry points report them once and exit (CLI) or map them to a status (HTTP).
 */

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends Error {
  constructor(message: string, public issues: ConfigIssue[] = []) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface EncodingDetails {
  encoding?: string;
  offset?: number;
  codePoint?: number;
}

export class EncodingError extends Error {
  constructor(message: string, public details: EncodingDetails = {}) {
    super(message);
    this.name = "EncodingError";
  }
}

export interface ShapingDetails {
  text: string;
  font?: string;
}

export class ShapingFailure extends Error {
  constructor(message: string, public details: ShapingDetails) {
    super(message);
    this.name = "ShapingFailure";
  }
}

export type LayoutError = ConfigError | EncodingError | ShapingFailure;

export function isLayoutError(err: unknown): err is LayoutError {
  return err instanceof ConfigError || err instanceof EncodingError || err instanceof ShapingFailure;
}
