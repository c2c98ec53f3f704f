/**
 * Music Catalog Service
 *
 * The public surface of the catalog: schema bootstrap, reset, batch ingestion and analytics.
 * Every `load*` call answers with the set of rejected keys; the `load*WithReport` variants
 * also say why each item was rejected.
 */

import { serializeError, toError } from '@music-catalog/platform-core';
import { getLogger } from '../../config/service-config';
import {
  CatalogMaintenanceRepository,
  DrizzleCatalogAnalyticsRepository,
  type CatalogDatabase,
  type CatalogTableName,
} from '../../infrastructure/database';
import type {
  AlbumInput,
  AlbumKey,
  ArtistSingleCount,
  GenreSongCount,
  IngestionReport,
  RatingKey,
  RejectSet,
  SingleSongInput,
  SongKey,
  SongRatingCount,
  SongRatingInput,
  UserKey,
  UserRatingCount,
  YearRange,
} from '../../domains/catalog';
import { CatalogError } from '../errors';
import {
  LoadAlbumsUseCase,
  LoadSingleSongsUseCase,
  LoadSongRatingsUseCase,
  LoadUsersUseCase,
} from '../use-cases/ingestion';
import { ClearCatalogUseCase } from '../use-cases/maintenance/ClearCatalogUseCase';
import { CatalogAnalyticsService } from './CatalogAnalyticsService';

const logger = getLogger('music-catalog-service');

export class MusicCatalogService {
  private readonly maintenanceRepository: CatalogMaintenanceRepository;
  private readonly analytics: CatalogAnalyticsService;
  private readonly loadSingleSongsUseCase: LoadSingleSongsUseCase;
  private readonly loadAlbumsUseCase: LoadAlbumsUseCase;
  private readonly loadUsersUseCase: LoadUsersUseCase;
  private readonly loadSongRatingsUseCase: LoadSongRatingsUseCase;
  private readonly clearCatalogUseCase: ClearCatalogUseCase;

  constructor(db: CatalogDatabase) {
    this.maintenanceRepository = new CatalogMaintenanceRepository(db);
    this.analytics = new CatalogAnalyticsService(new DrizzleCatalogAnalyticsRepository(db));
    this.loadSingleSongsUseCase = new LoadSingleSongsUseCase(db);
    this.loadAlbumsUseCase = new LoadAlbumsUseCase(db);
    this.loadUsersUseCase = new LoadUsersUseCase(db);
    this.loadSongRatingsUseCase = new LoadSongRatingsUseCase(db);
    this.clearCatalogUseCase = new ClearCatalogUseCase(this.maintenanceRepository);
  }

  // ===== MAINTENANCE =====

  /** Drops and recreates the catalog tables. All data is lost. */
  async applySchema(): Promise<void> {
    try {
      await this.maintenanceRepository.applySchema();
      logger.info('Catalog schema applied');
    } catch (error) {
      logger.error('Catalog schema bootstrap failed', { error: serializeError(error) });
      throw CatalogError.schemaBootstrapFailed(toError(error));
    }
  }

  async clearDatabase(): Promise<void> {
    await this.clearCatalogUseCase.execute();
  }

  async countRows(): Promise<Record<CatalogTableName, number>> {
    try {
      return await this.maintenanceRepository.countRows();
    } catch (error) {
      throw CatalogError.queryFailed('count-rows', toError(error));
    }
  }

  // ===== INGESTION =====

  async loadSingleSongs(singles: readonly SingleSongInput[]): Promise<RejectSet<SongKey>> {
    return (await this.loadSingleSongsWithReport(singles)).rejects;
  }

  loadSingleSongsWithReport(singles: readonly SingleSongInput[]): Promise<IngestionReport<SongKey>> {
    return this.loadSingleSongsUseCase.execute(singles);
  }

  async loadAlbums(albums: readonly AlbumInput[]): Promise<RejectSet<AlbumKey>> {
    return (await this.loadAlbumsWithReport(albums)).rejects;
  }

  loadAlbumsWithReport(albums: readonly AlbumInput[]): Promise<IngestionReport<AlbumKey>> {
    return this.loadAlbumsUseCase.execute(albums);
  }

  async loadUsers(usernames: readonly string[]): Promise<RejectSet<UserKey>> {
    return (await this.loadUsersWithReport(usernames)).rejects;
  }

  loadUsersWithReport(usernames: readonly string[]): Promise<IngestionReport<UserKey>> {
    return this.loadUsersUseCase.execute(usernames);
  }

  async loadSongRatings(songRatings: readonly SongRatingInput[]): Promise<RejectSet<RatingKey>> {
    return (await this.loadSongRatingsWithReport(songRatings)).rejects;
  }

  loadSongRatingsWithReport(songRatings: readonly SongRatingInput[]): Promise<IngestionReport<RatingKey>> {
    return this.loadSongRatingsUseCase.execute(songRatings);
  }

  // ===== ANALYTICS =====

  getMostProlificIndividualArtists(n: number, yearRange: YearRange): Promise<ArtistSingleCount[]> {
    return this.analytics.getMostProlificIndividualArtists(n, yearRange);
  }

  getArtistsLastSingleInYear(year: number): Promise<Set<string>> {
    return this.analytics.getArtistsLastSingleInYear(year);
  }

  getTopSongGenres(n: number): Promise<GenreSongCount[]> {
    return this.analytics.getTopSongGenres(n);
  }

  getAlbumAndSingleArtists(): Promise<Set<string>> {
    return this.analytics.getAlbumAndSingleArtists();
  }

  getMostRatedSongs(yearRange: YearRange, n: number): Promise<SongRatingCount[]> {
    return this.analytics.getMostRatedSongs(yearRange, n);
  }

  getMostEngagedUsers(yearRange: YearRange, n: number): Promise<UserRatingCount[]> {
    return this.analytics.getMostEngagedUsers(yearRange, n);
  }
}
