/**
 * Thrown by a query that meets a reference it cannot resolve.
 */
export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}
