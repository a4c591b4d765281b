export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class InvalidParameterError extends HttpError {
  readonly parameter: string;

  constructor(parameter: string, message: string, details?: unknown) {
    super(400, message, details);
    this.parameter = parameter;
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'not found', details?: unknown) {
    super(404, message, details);
  }
}

export function notFound(message = 'not found', details?: unknown): NotFoundError {
  return new NotFoundError(message, details);
}

export function invalidParameter(parameter: string, message: string, details?: unknown): InvalidParameterError {
  return new InvalidParameterError(parameter, message, details);
}

export type EtlErrorJson = {
  type: string;
  code: string;
  message: string;
  details: Record<string, unknown>;
};

/**
 * Base class of every data-quality or storage failure raised by the pipeline.
 * `details` names the offending key and value.
 */
export abstract class EtlError extends Error {
  abstract readonly code: string;
  abstract readonly fatal: boolean;
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }

  toJSON(): EtlErrorJson {
    return { type: this.name, code: this.code, message: this.message, details: this.details };
  }
}

export class ConflictingReferenceError extends EtlError {
  readonly code = 'conflicting_reference';
  readonly fatal = true;

  constructor(entity: string, key: string | number, values: unknown[]) {
    super(`${entity} ${key} maps to conflicting values: ${values.map((v) => JSON.stringify(v)).join(' vs ')}`, {
      entity,
      key,
      values,
    });
  }
}

export class MissingForeignKeyError extends EtlError {
  readonly code = 'missing_foreign_key';
  readonly fatal = true;

  constructor(programUrl: string, column: string, value: number | null) {
    super(`program stream ${programUrl} references unknown ${column} ${value ?? '(blank)'}`, {
      program_url: programUrl,
      column,
      value,
    });
  }
}

export class MissingColumnError extends EtlError {
  readonly code = 'missing_column';
  readonly fatal = true;

  constructor(source: string, column: string) {
    super(`${source} extract is missing required column ${column}`, { source, column });
  }
}

export class InvalidRecordError extends EtlError {
  readonly code = 'invalid_record';
  readonly fatal = true;

  constructor(source: string, row: number, column: string, value: unknown, expected = 'an integer') {
    super(`${source} row ${row}: ${column} is not ${expected} (${JSON.stringify(value)})`, {
      source,
      row,
      column,
      value,
    });
  }
}

export class LoadError extends EtlError {
  readonly code = 'load_failed';
  readonly fatal = true;

  constructor(table: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`loading ${table} failed: ${reason}`, { table, reason }, { cause });
  }
}

export class UnjoinedSectionError extends EtlError {
  readonly code = 'unjoined_section';
  readonly fatal = false;

  constructor(sourceUrl: string | null, programDescriptionId: number | null, row: number) {
    super(`x_section row ${row} (${sourceUrl ?? 'no source'}) matches no program stream`, {
      source_url: sourceUrl,
      program_description_id: programDescriptionId,
      row,
    });
  }
}

export class DuplicateProgramUrlError extends EtlError {
  readonly code = 'duplicate_program_url';
  readonly fatal = false;

  constructor(programUrl: string, records: number) {
    super(`program_url ${programUrl} appears on ${records} records with conflicting attributes`, {
      program_url: programUrl,
      records,
    });
  }
}

export type RecoverableError = UnjoinedSectionError | DuplicateProgramUrlError;
