export { SchoolRegistry, DEFAULT_SCHOOLS } from './school-registry.js';
export {
  IngestPipeline,
  IngestError,
  MIN_TEXT_LENGTH,
  communityPostText,
  loadCrawlDocuments,
  pageIdForUrl,
} from './ingest-pipeline.js';
export type {
  CommunityPost,
  CrawlFile,
  EmbedOptions,
  EmbedPagesError,
  EmbedReport,
  IngestPipelineDeps,
  IngestReport,
  SkipReason,
  SkippedPage,
} from './ingest-pipeline.js';
