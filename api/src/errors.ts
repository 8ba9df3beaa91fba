export class HttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
  }
}

// Raised before any scoring when neither developer sent code.
export class NoSubmissionsError extends HttpError {
  constructor() {
    super(400, 'Enter code for at least one developer.');
    this.name = 'NoSubmissionsError';
  }
}

export class RankingFileError extends Error {
  readonly filePath: string;

  constructor(filePath: string, detail: string) {
    super(`Ranking file ${filePath} is unreadable: ${detail}`);
    this.name = 'RankingFileError';
    this.filePath = filePath;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
