/**
 * gRPC status codes returned by Document AI that have a known remedy
 */
const STATUS_HINTS: Record<number, string> = {
  3: 'Invalid request. Please verify the document format and MIME type.', // INVALID_ARGUMENT
  5: 'Processor not found. Please verify PROJECT_ID, LOCATION, PROCESSOR_ID and PROCESSOR_VERSION.', // NOT_FOUND
  7: 'Permission denied. Please verify the service account has roles/documentai.apiUser.', // PERMISSION_DENIED
  16: 'Authentication failed. Please verify the credentials file.', // UNAUTHENTICATED
};

function hasStatusCode(error: unknown): error is { code: number } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'number'
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Suggests what to check for a failed Document AI call, if the status code
 * is one of the common configuration mistakes.
 */
export function describeProcessingFailure(error: unknown): string | undefined {
  if (!hasStatusCode(error)) {
    return undefined;
  }

  return STATUS_HINTS[error.code];
}
