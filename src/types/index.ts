/** 
 * Central export of all type definitions for the catalog queries. 
 * */

export type { Doc } from './doc';
export type { PersonDoc, MotherAndChildName } from './person';
export type { BookDoc } from './book';
export type { CatalogInput, CatalogQueryOptions } from './catalog-input';
export type { CatalogReport } from './catalog-report';
