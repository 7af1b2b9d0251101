export type DataFileErrorCode = 'missing_column' | 'bad_value' | 'csv_syntax';

export class DataFileError extends Error {
  public readonly code: DataFileErrorCode;
  public readonly file: string;

  constructor(code: DataFileErrorCode, file: string, message: string) {
    super(`${file}: ${message}`);
    this.name = 'DataFileError';
    this.code = code;
    this.file = file;
  }
}
