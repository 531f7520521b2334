/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency is looked up by one of these symbols. The two
 * HTTP clients share an interface, so they are told apart by token rather
 * than by type.
 */
export const TOKENS = {
  // Infrastructure
  Logger: Symbol.for('Logger'),
  Config: Symbol.for('Config'),
  AffinityHttpClient: Symbol.for('AffinityHttpClient'),
  NotionHttpClient: Symbol.for('NotionHttpClient'),

  // Normalization settings
  SummaryFieldIds: Symbol.for('SummaryFieldIds'),

  // Services
  AffinityService: Symbol.for('AffinityService'),
  NotionService: Symbol.for('NotionService'),
} as const;
