import { ValidateFunction } from "ajv";

export interface ConfigurationIssue {
  readonly errorCode: string;
  readonly message: string;
}

export class JSONParserError extends Error {
  constructor(public errors: { errorCode: string; message?: string }[]) {
    super(`JSON payload failed validation: ${JSON.stringify(errors)}`);
    this.name = "JSONParserError";
  }
}

/**
 * Static misconfiguration detected before anything is resolved or written.
 * All issues found in one pass are reported together
 */
export class ConfigurationError extends Error {
  constructor(public issues: ConfigurationIssue[]) {
    super(issues.map((issue) => issue.message).join("; "));
    this.name = "ConfigurationError";
  }
}

export const imperativeParseJSON = <T>(
  data: unknown,
  validate: ValidateFunction<T>
): T => {
  if (!data) {
    throw new JSONParserError([{ errorCode: "null_json" }]);
  }

  let parsed: unknown;
  try {
    parsed = typeof data === "string" ? JSON.parse(data) : data;
  } catch (e) {
    throw new JSONParserError([{ errorCode: "malformed_json" }]);
  }

  if (validate(parsed)) {
    return parsed;
  }

  throw new JSONParserError(
    (validate.errors ?? []).map(({ instancePath, message }) => ({
      errorCode: "schema-error",
      message: `Failure on property ${instancePath || "/"} . ${message}`,
    }))
  );
};
