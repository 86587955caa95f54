export { createArchiveQueries, type ArchiveQueries, type ListVideosInput } from './archive-queries.ts';
