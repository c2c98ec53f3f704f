import { DomainErrorCode, createDomainServiceError } from '@music-catalog/platform-core';

const CatalogDomainCodes = {
  RESET_FAILED: 'RESET_FAILED',
  SCHEMA_BOOTSTRAP_FAILED: 'SCHEMA_BOOTSTRAP_FAILED',
  QUERY_FAILED: 'QUERY_FAILED',
  INVALID_QUERY_ARGUMENT: 'INVALID_QUERY_ARGUMENT',
  SONG_REJECTED: 'SONG_REJECTED',
  INSERT_FAILED: 'INSERT_FAILED',
} as const;

export const CatalogErrorCode = { ...DomainErrorCode, ...CatalogDomainCodes } as const;
export type CatalogErrorCodeType = (typeof CatalogErrorCode)[keyof typeof CatalogErrorCode];

const CatalogErrorBase = createDomainServiceError<CatalogErrorCodeType>('Catalog', CatalogErrorCode);

export class CatalogError extends CatalogErrorBase {
  static resetFailed(cause?: Error) {
    return new CatalogError('Catalog reset failed', 500, CatalogErrorCode.RESET_FAILED, cause);
  }

  static schemaBootstrapFailed(cause?: Error) {
    return new CatalogError('Catalog schema bootstrap failed', 500, CatalogErrorCode.SCHEMA_BOOTSTRAP_FAILED, cause);
  }

  static queryFailed(query: string, cause?: Error) {
    return new CatalogError(`Catalog query failed: ${query}`, 500, CatalogErrorCode.QUERY_FAILED, cause);
  }

  static invalidQueryArgument(argument: string, reason: string) {
    return new CatalogError(
      `Invalid ${argument}: ${reason}`,
      400,
      CatalogErrorCode.INVALID_QUERY_ARGUMENT
    );
  }

  static albumSongRejected(albumTitle: string, songTitle: string, cause?: Error) {
    return new CatalogError(
      `Song '${songTitle}' of album '${albumTitle}' was rejected by the store`,
      409,
      CatalogErrorCode.SONG_REJECTED,
      cause
    );
  }

  static insertFailed(entity: string) {
    return new CatalogError(`Insert into ${entity} returned no row`, 500, CatalogErrorCode.INSERT_FAILED);
  }
}
