import type { CatalogInput } from '../types';

/**
 * Custom validation error thrown when input validation fails.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(`Validation Error: ${message}`);
    this.name = 'ValidationError';
  }
}

/**
 * Validates a string is non-empty.
 */
export function validateString(value: unknown, fieldName: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`${fieldName} must be a non-empty string`);
  }
  return value;
}

/**
 * Validates a value is a boolean.
 */
function validateBoolean(value: unknown, fieldName: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${fieldName} must be a boolean`);
  }
  return value;
}

/**
 * Validates a value is an array.
 */
function validateArray(value: unknown, fieldName: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`${fieldName} must be an array`);
  }
  return value;
}

/**
 * Validates a value matches one of the allowed literal values.
 */
export function validateLiteral<T extends string>(value: unknown, fieldName: string, allowed: readonly T[]): T {
  const match = allowed.find((a) => a === value);
  if (match === undefined) {
    throw new ValidationError(`${fieldName} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

function validateObject(value: unknown, fieldName: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ValidationError(`${fieldName} must be an object`);
  }
  return value as Record<string, unknown>;
}

/**
 * Validates the docId/docType envelope and returns the data payload.
 */
function validateEnvelope(doc: unknown, label: string, docType: string): { docId: string; data: Record<string, unknown> } {
  const obj = validateObject(doc, label);
  const docId = validateString(obj.docId, `${label} docId`);
  validateLiteral(obj.docType, `${label} docType`, [docType]);
  return { docId, data: validateObject(obj.data, `${label} data`) };
}

/**
 * Validates a single person and returns its docId and child ids.
 */
function validatePerson(person: unknown): { docId: string; childIds: string[] } {
  const { docId, data } = validateEnvelope(person, 'Person', 'person');

  validateString(data.name, 'Person name');
  validateBoolean(data.isMale, 'Is male');

  const childIds: string[] = [];
  if (data.childIds !== undefined) {
    for (const id of validateArray(data.childIds, 'Child IDs')) {
      childIds.push(validateString(id, 'Child ID'));
    }
  }
  return { docId, childIds };
}

/**
 * Validates a single book and returns its docId.
 */
function validateBook(book: unknown): string {
  const { docId, data } = validateEnvelope(book, 'Book', 'book');

  validateString(data.title, 'Book title');

  const authors = validateArray(data.authors, 'Authors');
  if (authors.length === 0) {
    throw new ValidationError(`Book ${docId} must have at least one author`);
  }
  for (const author of authors) {
    validateString(author, 'Author');
  }
  return docId;
}

function rejectDuplicateIds(ids: string[], label: string): void {
  const seen = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) {
      throw new ValidationError(`Duplicate ${label} docId: ${id}`);
    }
    seen.add(id);
  }
}

/**
 * Validates the entire catalog input.
 * Throws ValidationError if any constraint is violated.
 *
 * @param input - The input to validate
 * @throws ValidationError if validation fails
 *
 * @example
 * ```typescript
 * try {
 *   validateCatalogInput(input);
 * } catch (err) {
 *   if (err instanceof ValidationError) {
 *     console.error(err.message);
 *   }
 * }
 * ```
 */
export function validateCatalogInput(input: unknown): input is CatalogInput {
  const obj = validateObject(input, 'Input');

  const people = validateArray(obj.people, 'People').map(validatePerson);
  rejectDuplicateIds(
    people.map((p) => p.docId),
    'person',
  );

  // every child must be one of the people above
  const personIds = new Set(people.map((p) => p.docId));
  for (const p of people) {
    for (const childId of p.childIds) {
      if (!personIds.has(childId)) {
        throw new ValidationError(`Person ${p.docId} references unknown child ${childId}`);
      }
    }
  }

  const bookIds = validateArray(obj.books, 'Books').map(validateBook);
  rejectDuplicateIds(bookIds, 'book');

  return true;
}

function assertCatalogInput(input: unknown): asserts input is CatalogInput {
  validateCatalogInput(input);
}

/**
 * Validates `input` and returns it typed as a CatalogInput.
 */
export function parseCatalogInput(input: unknown): CatalogInput {
  assertCatalogInput(input);
  return input;
}
