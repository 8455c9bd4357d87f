/**
 * Candidate generation, review and scoring.
 */

export { DocstringGenerator, validateModelText } from './DocstringGenerator';
export { DocstringCritic, CriticConfig, isTrivialElement } from './DocstringCritic';
export { ConfidenceScorer, ConfidenceBreakdown, CONFIDENCE_WEIGHTS } from './ConfidenceScorer';
export {
  STYLE_TEMPLATES,
  StyleTemplate,
  DocSections,
  ParamSection,
  ReturnSection,
  RaiseSection,
  getTemplate,
  renderDocstring,
  placeholderSections,
  fallbackSummary,
  displayName,
  displayType,
} from './StyleTemplates';
export {
  QUOTE,
  WORD_BAND,
  MAX_DOC_LINES,
  isDelimited,
  docstringBody,
  countWords,
  countLines,
  mentions,
  wrapDocstring,
} from './DocstringText';
