import { Ajv, type ErrorObject, type JSONSchemaType, type ValidateFunction } from "ajv";

export interface RawConsoleConfig {
  top_event_types?: number;
  sample_events?: number;
  suspicious_events?: number;
}

export interface RawSysmonReportConfig {
  input_file?: string;
  report_file?: string;
  console?: RawConsoleConfig;
}

const CONSOLE_LIMIT_SCHEMA = { type: "integer", minimum: 0, nullable: true } as const;

export const CONFIG_FILE_SCHEMA: JSONSchemaType<RawSysmonReportConfig> = {
  type: "object",
  properties: {
    input_file: { type: "string", minLength: 1, nullable: true },
    report_file: { type: "string", minLength: 1, nullable: true },
    console: {
      type: "object",
      properties: {
        top_event_types: CONSOLE_LIMIT_SCHEMA,
        sample_events: CONSOLE_LIMIT_SCHEMA,
        suspicious_events: CONSOLE_LIMIT_SCHEMA,
      },
      additionalProperties: false,
      nullable: true,
    },
  },
  additionalProperties: false,
};

export function buildConfigValidator(): ValidateFunction<RawSysmonReportConfig> {
  const ajv = new Ajv({ allErrors: true });
  return ajv.compile(CONFIG_FILE_SCHEMA);
}

export function formatValidationErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return "Invalid config.";
  }

  return errors
    .map((error) => {
      const pathPrefix = error.instancePath ? `${error.instancePath} ` : "";
      return `${pathPrefix}${error.message ?? "is invalid"}`.trim();
    })
    .join("; ");
}
