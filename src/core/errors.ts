/**
 * Raised when the OCR document does not have the expected nesting
 * (missing `Result`, a non-array `regions`, a line that is not an object...).
 */
export class DocumentStructureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DocumentStructureError';
  }
}
