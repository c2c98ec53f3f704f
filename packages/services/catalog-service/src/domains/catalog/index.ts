export * from './value-objects';
export * from './entities/CatalogInputs';
