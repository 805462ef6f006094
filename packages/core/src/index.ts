// accord-core

// Types
export * from './types.js';

// Errors
export {
  AccordError,
  ERROR_METADATA,
  createStructuredError,
  setLastError,
  getLastError,
  getLastStructuredError,
  clearLastError,
} from './errors.js';
export type { AccordErrorCode, ErrorCategory, ErrorSeverity, StructuredError } from './errors.js';

// Event Bus
export { EventBus, createEventBus, shouldLog, CHANNELS } from './event-bus.js';

// Config Loader
export {
  loadConfig,
  parseConfig,
  resolveEnvVariables,
  AccordConfigSchema,
  MockServerSchema,
  VerifierSchema,
  PactSourceSchema,
} from './config-loader.js';
export type { AccordConfig, VerifierConfig, PactSourceConfig } from './config-loader.js';

// Schema Generator
export {
  generateSchemas,
  getConfigJsonSchema,
  getPactJsonSchema,
  validatePactDocument,
} from './schema-generator.js';

// Models
export { DocPath } from './models/doc-path.js';
export type { PathToken, PathSegments } from './models/doc-path.js';
export {
  MatchingRules,
  MatchingRuleCategory,
  matchingRuleFromJson,
  matchingRuleToJson,
  RULE_CATEGORIES,
} from './models/matching-rules.js';
export type {
  MatchingRule,
  MatchingRuleDefinition,
  MatchingReference,
  RuleList,
  RuleLogic,
  ValueType,
  RuleCategoryName,
} from './models/matching-rules.js';
export { Generators, generatorFromJson, generatorToJson } from './models/generators.js';
export type { Generator, GeneratorCategory } from './models/generators.js';
export { processIntegrationJson, processScalar } from './models/integration-json.js';
export {
  readPact,
  readPactText,
  writePact,
  clonePact,
  interactionKey,
  PactDocumentSchema,
} from './models/pact.js';

// Matcher Expressions
export { parseMatcherExpression, renderMatcherExpression } from './expressions/parser.js';
export { parseMatcherDefinition, DefinitionResult, MatchingRuleIterator } from './expressions/definition-result.js';
export type { MatchingRuleEntry } from './expressions/definition-result.js';

// Matching
export { matchValue, checkRegex, detectContentType } from './matching/rule-evaluator.js';
export { evaluate, matchBody, compareJson } from './matching/body-matcher.js';
export type { RuleMismatch } from './matching/body-matcher.js';
export {
  matchRequest,
  matchResponse,
  matchMessage,
} from './matching/request-matcher.js';
export { generateDatetimeString } from './matching/datetime.js';

// Generators
export {
  createRandom,
  generateValue,
  generateRegexValue,
  applyGenerators,
  generateRequest,
  generateResponse,
} from './generators/generator-engine.js';
export type { GeneratorContext, GeneratorMode } from './generators/generator-engine.js';

// Handles
export { HandleRegistry } from './handles/registry.js';
export * from './handles/pact-handles.js';

// Mock Server
export { MockServer } from './mock-server/mock-server.js';
export type { MockServerOptions, MockServerState } from './mock-server/mock-server.js';
export {
  createMockServer,
  createMockServerForPact,
  getMockServer,
  mockServerMatched,
  mockServerMismatches,
  mockServerLogs,
  cleanupMockServer,
  cleanupAllMockServers,
  writePactFile,
  parseBindAddress,
} from './mock-server/server-manager.js';
export type { CreateMockServerOptions } from './mock-server/server-manager.js';

// Pact Writer
export { mergePacts, pactFileName, writePactFile as writePactToDirectory } from './pact-writer.js';

// Verifier
export { Verifier } from './verifier/verifier.js';
export type {
  VerifierOptions,
  VerificationResult,
  ProviderInfo,
  InteractionFilter,
  MessageHandler,
  ProducedMessage,
} from './verifier/verifier.js';
export { loadSource } from './verifier/sources.js';
export type { PactSource, PactBroker, LoadedPact } from './verifier/sources.js';
export { verify, createVerifyCommand } from './verifier/verify-args.js';

// Reporters
export { ConsoleReporter, JSONReporter, buildReport, formatMismatch } from './reporter.js';

