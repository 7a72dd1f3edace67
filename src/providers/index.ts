export type { IEmbeddingProvider } from './IEmbeddingProvider.js';
export { OpenAIEmbeddingProvider } from './OpenAIEmbeddingProvider.js';
export type {
  IEvaluatorProvider,
  JudgeRequest,
  ClassifyRequest,
  CategorySummary,
} from './IEvaluatorProvider.js';
export { OpenAIEvaluatorProvider } from './OpenAIEvaluatorProvider.js';
export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
