/**
 * StyleTemplates - The three docstring layouts.
 *
 * Each template is versioned; a change in rendered output bumps the
 * version, which also invalidates cached results.
 */

import { CodeElement, DocstringStyle, InferredType, Parameter } from '../types';
import { wrapDocstring } from './DocstringText';

export interface ParamSection {
  name: string;
  /** `*args` / `**kwargs` spelling */
  display: string;
  type?: string;
  description: string;
}

export interface ReturnSection {
  type?: string;
  description: string;
  isGenerator: boolean;
}

export interface RaiseSection {
  kind: string;
  description: string;
}

export interface DocSections {
  summary: string;
  description?: string;
  params: ParamSection[];
  returns?: ReturnSection;
  raises: RaiseSection[];
}

export interface StyleTemplate {
  readonly style: DocstringStyle;
  readonly version: string;
  readonly label: string;
  /** Body lines, without quotes */
  renderLines(sections: DocSections): string[];
  /** Headers an element's docstring must carry in this style */
  requiredHeaders(element: CodeElement): string[];
  /** Whether the header appears as a section opener in the text */
  hasHeader(text: string, header: string): boolean;
  hasReturnsSection(text: string): boolean;
}

function preamble(sections: DocSections): string[] {
  const lines = [sections.summary];
  if (sections.description) {
    lines.push('', ...sections.description.split('\n'));
  }
  return lines;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function lineMatches(text: string, pattern: string): boolean {
  return new RegExp(`^[ \\t]*${pattern}`, 'm').test(text);
}

const googleTemplate: StyleTemplate = {
  style: 'google',
  version: '1.0.0',
  label: 'Google (labeled sections)',

  renderLines(sections) {
    const lines = preamble(sections);
    if (sections.params.length > 0) {
      lines.push('', 'Args:');
      for (const p of sections.params) {
        const typed = p.type ? `${p.display} (${p.type})` : p.display;
        lines.push(`    ${typed}: ${p.description}`);
      }
    }
    if (sections.returns) {
      const r = sections.returns;
      lines.push('', r.isGenerator ? 'Yields:' : 'Returns:');
      lines.push(r.type ? `    ${r.type}: ${r.description}` : `    ${r.description}`);
    }
    if (sections.raises.length > 0) {
      lines.push('', 'Raises:');
      for (const e of sections.raises) {
        lines.push(`    ${e.kind}: ${e.description}`);
      }
    }
    return lines;
  },

  requiredHeaders(element) {
    const headers: string[] = [];
    if (element.parameters.length > 0) headers.push('Args:');
    if (element.returns) headers.push(element.returns.isGenerator ? 'Yields:' : 'Returns:');
    if (element.raises.length > 0) headers.push('Raises:');
    return headers;
  },

  hasHeader(text, header) {
    return lineMatches(text, `${escapeRegExp(header)}[ \\t]*$`);
  },

  hasReturnsSection(text) {
    return lineMatches(text, '(Returns|Yields):[ \\t]*$');
  },
};

function numpyHeader(lines: string[], title: string): void {
  lines.push('', title, '-'.repeat(title.length));
}

const numpyTemplate: StyleTemplate = {
  style: 'numpy',
  version: '1.0.0',
  label: 'NumPy (underlined sections)',

  renderLines(sections) {
    const lines = preamble(sections);
    if (sections.params.length > 0) {
      numpyHeader(lines, 'Parameters');
      for (const p of sections.params) {
        lines.push(p.type ? `${p.display} : ${p.type}` : p.display, `    ${p.description}`);
      }
    }
    if (sections.returns) {
      const r = sections.returns;
      numpyHeader(lines, r.isGenerator ? 'Yields' : 'Returns');
      if (r.type) lines.push(r.type);
      lines.push(`    ${r.description}`);
    }
    if (sections.raises.length > 0) {
      numpyHeader(lines, 'Raises');
      for (const e of sections.raises) {
        lines.push(e.kind, `    ${e.description}`);
      }
    }
    return lines;
  },

  requiredHeaders(element) {
    const headers: string[] = [];
    if (element.parameters.length > 0) headers.push('Parameters');
    if (element.returns) headers.push(element.returns.isGenerator ? 'Yields' : 'Returns');
    if (element.raises.length > 0) headers.push('Raises');
    return headers;
  },

  hasHeader(text, header) {
    return lineMatches(text, `${escapeRegExp(header)}[ \\t]*\\r?\\n[ \\t]*-{3,}[ \\t]*$`);
  },

  hasReturnsSection(text) {
    return lineMatches(text, '(Returns|Yields)[ \\t]*\\r?\\n[ \\t]*-{3,}[ \\t]*$');
  },
};

const rstTemplate: StyleTemplate = {
  style: 'rst',
  version: '1.0.0',
  label: 'reStructuredText (directive-prefixed)',

  renderLines(sections) {
    const lines = preamble(sections);
    const fields: string[] = [];
    for (const p of sections.params) {
      fields.push(`:param ${p.display}: ${p.description}`);
      if (p.type) fields.push(`:type ${p.display}: ${p.type}`);
    }
    if (sections.returns) {
      const r = sections.returns;
      fields.push(r.isGenerator ? `:yields: ${r.description}` : `:returns: ${r.description}`);
      if (r.type) fields.push(r.isGenerator ? `:ytype: ${r.type}` : `:rtype: ${r.type}`);
    }
    for (const e of sections.raises) {
      fields.push(`:raises ${e.kind}: ${e.description}`);
    }
    if (fields.length > 0) lines.push('', ...fields);
    return lines;
  },

  requiredHeaders(element) {
    const headers: string[] = [];
    if (element.parameters.length > 0) headers.push(':param');
    if (element.returns) headers.push(element.returns.isGenerator ? ':yields:' : ':returns:');
    if (element.raises.length > 0) headers.push(':raises');
    return headers;
  },

  hasHeader(text, header) {
    return lineMatches(text, escapeRegExp(header));
  },

  hasReturnsSection(text) {
    return lineMatches(text, ':(returns?|yields?):');
  },
};

export const STYLE_TEMPLATES: Readonly<Record<DocstringStyle, StyleTemplate>> = {
  google: googleTemplate,
  numpy: numpyTemplate,
  rst: rstTemplate,
};

export function getTemplate(style: DocstringStyle): StyleTemplate {
  return STYLE_TEMPLATES[style];
}

// ============================================================================
// RULE-BASED CONTENT
// ============================================================================

/** Type to print for a parameter, or undefined when only `unknown` is known */
export function displayType(declared: string | undefined, inferred: InferredType | undefined): string | undefined {
  if (declared !== undefined) return declared;
  if (inferred?.kind === 'known') return inferred.name;
  return undefined;
}

export function displayName(parameter: Parameter): string {
  if (parameter.kind === 'variadic') return `*${parameter.name}`;
  if (parameter.kind === 'keywordVariadic') return `**${parameter.name}`;
  return parameter.name;
}

export function fallbackSummary(element: CodeElement): string {
  switch (element.kind) {
    case 'constructor':
      return `Initialize ${element.ownerName ?? 'instance'}.`;
    case 'method':
      return `${element.name} method.`;
    case 'class':
      return `${element.name} class.`;
    default:
      return `${element.name} function.`;
  }
}

/**
 * Sections filled with placeholder prose, straight from the element facts.
 */
export function placeholderSections(element: CodeElement): DocSections {
  const returns = element.returns;
  return {
    summary: fallbackSummary(element),
    params: element.parameters.map((p) => ({
      name: p.name,
      display: displayName(p),
      type: displayType(p.declaredType, p.inferredType),
      description: `Description of ${p.name}.`,
    })),
    returns: returns
      ? {
          type: displayType(returns.declaredType, returns.inferredType),
          description: returns.isGenerator ? 'Description of yielded values.' : 'Description of return value.',
          isGenerator: returns.isGenerator,
        }
      : undefined,
    raises: element.raises.map((e) => ({
      kind: e.kind,
      description: e.description ?? 'When this exception is raised.',
    })),
  };
}

/** Full candidate literal for the given sections */
export function renderDocstring(style: DocstringStyle, sections: DocSections): string {
  return wrapDocstring(getTemplate(style).renderLines(sections));
}
