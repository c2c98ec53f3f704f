export { MusicCatalogService } from './MusicCatalogService';
export { CatalogAnalyticsService } from './CatalogAnalyticsService';
