export { CatalogError, CatalogErrorCode, type CatalogErrorCodeType } from './errors';
