export { LoadSingleSongsUseCase } from './LoadSingleSongsUseCase';
export { LoadAlbumsUseCase } from './LoadAlbumsUseCase';
export { LoadUsersUseCase } from './LoadUsersUseCase';
export { LoadSongRatingsUseCase, MIN_RATING, MAX_RATING } from './LoadSongRatingsUseCase';
