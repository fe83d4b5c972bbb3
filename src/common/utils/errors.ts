// Helper to extract error message from unknown error type
export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
};

export const getErrorStack = (error: unknown): string | undefined =>
  error instanceof Error ? error.stack : undefined;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readField(source: Record<string, unknown>, field: string): string | undefined {
  const value = source[field];
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

const STORE_ERROR_FIELDS = [
  ['code', 'Code'],
  ['detail', 'Details'],
  ['hint', 'Hint'],
] as const;

/**
 * Flattens a datastore failure into a single log line. TypeORM's
 * QueryFailedError copies the pg driver fields (code, detail, hint) onto
 * itself and also keeps them on `driverError`.
 */
export function describeStoreError(error: unknown): string {
  let description = `General exception: ${getErrorMessage(error)}`;
  if (!isRecord(error)) return description;

  const driverError = isRecord(error.driverError) ? error.driverError : undefined;
  for (const [field, label] of STORE_ERROR_FIELDS) {
    const value = readField(error, field) ?? (driverError && readField(driverError, field));
    if (value) {
      description += ` | ${label}: ${value}`;
    }
  }
  return description;
}
