export type { IEmbeddingProvider } from './IEmbeddingProvider.js';
export { OpenAIEmbeddingProvider } from './OpenAIEmbeddingProvider.js';
export type { IAdvisoryProvider, AdvisoryInput, AdvisoryDecision } from './IAdvisoryProvider.js';
export { OpenAIAdvisoryProvider } from './OpenAIAdvisoryProvider.js';
export { RuleBasedAdvisoryProvider, ruleBasedDecision } from './RuleBasedAdvisoryProvider.js';
export type { ILogProvider, LogEvent, LogLevel } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
export { BoundLogProvider } from './BoundLogProvider.js';
