export type AppErrorCode =
  | 'TRANSCRIPT_FETCH_FAILED'
  | 'TRANSCRIPT_LIST_FAILED'
  | 'VALIDATION_ERROR'
  | 'ROUTE_NOT_FOUND'
  | 'PAYLOAD_TOO_LARGE'
  | 'UNSUPPORTED_MEDIA_TYPE'
  | 'BAD_REQUEST'
  | 'INTERNAL_ERROR';

export class AppError extends Error {
  public statusCode: number;

  constructor(public code: AppErrorCode, message: string) {
    super(message);
    this.name = 'AppError';
    this.statusCode = this.getStatusCode(code);
  }

  private getStatusCode(code: AppErrorCode): number {
    switch (code) {
      // Upstream failures of every kind are reported as bad requests.
      case 'TRANSCRIPT_FETCH_FAILED':
      case 'TRANSCRIPT_LIST_FAILED':
        return 400;
      case 'VALIDATION_ERROR':
        return 422;
      case 'ROUTE_NOT_FOUND':
        return 404;
      case 'PAYLOAD_TOO_LARGE':
        return 413;
      case 'UNSUPPORTED_MEDIA_TYPE':
        return 415;
      case 'BAD_REQUEST':
        return 400;
      default:
        return 500;
    }
  }

  static transcriptFetchFailed(cause: string): AppError {
    return new AppError('TRANSCRIPT_FETCH_FAILED', `Failed to fetch transcript: ${cause}`);
  }

  static transcriptListFailed(cause: string): AppError {
    return new AppError('TRANSCRIPT_LIST_FAILED', `Failed to fetch transcript list: ${cause}`);
  }

  static validation(message: string): AppError {
    return new AppError('VALIDATION_ERROR', message);
  }

  static notFound(message: string): AppError {
    return new AppError('ROUTE_NOT_FOUND', message);
  }

  /** A body the parser refused: 413 and 415 keep their status, anything else is a 400. */
  static rejectedRequest(status: number, message: string): AppError {
    switch (status) {
      case 413:
        return new AppError('PAYLOAD_TOO_LARGE', message);
      case 415:
        return new AppError('UNSUPPORTED_MEDIA_TYPE', message);
      default:
        return new AppError('BAD_REQUEST', message);
    }
  }

  static internal(message: string): AppError {
    return new AppError('INTERNAL_ERROR', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
