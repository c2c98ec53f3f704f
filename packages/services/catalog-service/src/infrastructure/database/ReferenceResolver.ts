/**
 * Lookup-or-create resolution of artist and genre names.
 *
 * Every call reads through the caller's transaction; nothing is cached.
 */

import type { DrizzleCatalogRepository } from './DrizzleCatalogRepository';

export class ReferenceResolver {
  constructor(private readonly repository: DrizzleCatalogRepository) {}

  async resolveArtist(name: string): Promise<number> {
    const existing = await this.repository.findArtistId(name);
    return existing ?? this.repository.insertArtist(name);
  }

  async resolveGenre(name: string): Promise<number> {
    const existing = await this.repository.findGenreId(name);
    return existing ?? this.repository.insertGenre(name);
  }
}
