/**
 * Core components: tokenizer, statement parser, element extraction.
 */

export { Tokenizer, Token, TokenType, TokenizeResult, tokenize } from './Tokenizer';
export {
  parseModule,
  collectTokens,
  walkStatements,
  ParsedModule,
  Statement,
  SimpleStatement,
  CompoundStatement,
  BlockStatement,
  Decorator,
} from './SyntaxTree';
export { ElementExtractor, ExtractorOptions, ExtractionResult } from './ElementExtractor';
export { LineIndex, LineEnding, dominantLineEnding } from './SourceText';
export { SourceFinder, FinderOptions, isPythonSource, PYTHON_EXTENSIONS } from './SourceFinder';
export {
  ParseError,
  GenerationFailure,
  EvaluationFailure,
  AIValidationError,
  ConfigError,
  FileProcessingError,
  errorMessage,
} from './errors';
