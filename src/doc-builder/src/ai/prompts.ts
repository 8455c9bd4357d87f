/**
 * Prompt text for docstring generation and review.
 *
 * Responses are XML, parsed by the helpers in AIClient.
 */

import { EvaluationRequest, GenerationRequest, ElementFacts } from './capabilities';
import { renderDocstring } from '../generation/StyleTemplates';

export const GENERATION_SYSTEM_PROMPT = `You are an expert Python documentation writer.
Write clear, accurate docstrings that describe what the code does and why a caller would use it.
Follow the requested docstring style exactly. Mention every parameter and every raised exception by name.
Do not invent parameters, return values or exceptions that are not in the facts.

Output your response in XML format:
<response>
  <docstring>
The docstring body, without surrounding quotes
  </docstring>
</response>`;

export const EVALUATION_SYSTEM_PROMPT = `You are a strict reviewer of Python docstrings.
Judge whether the docstring is accurate for the code, complete, and clearly written.

Output your response in XML format:
<review>
  <score>0.0 to 1.0</score>
  <issues>
    <issue>One concrete problem</issue>
  </issues>
  <suggestions>
    <suggestion>One concrete improvement</suggestion>
  </suggestions>
</review>`;

function describeFacts(facts: ElementFacts): string {
  const lines = [`Element: ${facts.kind} ${facts.qualifiedName}`];

  if (facts.parameters.length > 0) {
    lines.push('Parameters:');
    for (const p of facts.parameters) {
      const type = p.type ?? 'unknown type';
      const def = p.defaultValue !== undefined ? `, default ${p.defaultValue}` : '';
      lines.push(`- ${p.display} (${type}${def})`);
    }
  } else {
    lines.push('Parameters: none');
  }

  if (facts.returns) {
    const what = facts.returns.isGenerator ? 'Yields' : 'Returns';
    const multi = facts.returns.isMultiValue ? ' (tuple of values)' : '';
    lines.push(`${what}: ${facts.returns.type ?? 'unknown type'}${multi}`);
  } else {
    lines.push('Returns: nothing');
  }

  lines.push(`Raises: ${facts.raises.length > 0 ? facts.raises.join(', ') : 'nothing'}`);
  lines.push(`Cyclomatic complexity: ${facts.complexity}`);
  if (facts.modifiers.length > 0) {
    lines.push(`Modifiers: ${facts.modifiers.join(', ')}`);
  }
  return lines.join('\n');
}

export function buildGenerationPrompt(request: GenerationRequest): string {
  const { facts, template, priorReview } = request;

  // Skeleton in the target style shows the expected layout
  const skeleton = renderDocstring(request.style, {
    summary: 'One-line summary.',
    params: facts.parameters.map((p) => ({
      name: p.name,
      display: p.display,
      type: p.type,
      description: `Description of ${p.name}.`,
    })),
    returns: facts.returns
      ? {
          type: facts.returns.type,
          description: 'Description of return value.',
          isGenerator: facts.returns.isGenerator,
        }
      : undefined,
    raises: facts.raises.map((kind) => ({ kind, description: 'When this exception is raised.' })),
  });

  let prompt = `${describeFacts(facts)}

Body summary:
\`\`\`
${facts.digest}
\`\`\`

Style: ${template.label} (template ${template.version})
Layout to follow (replace the placeholder prose):
${skeleton}
`;

  if (priorReview && (priorReview.issues.length > 0 || priorReview.suggestions.length > 0)) {
    prompt += `
The previous attempt scored ${priorReview.score.toFixed(2)}. Fix these problems:
${priorReview.issues.map((i) => `- ${i}`).join('\n')}
${priorReview.suggestions.map((s) => `- ${s}`).join('\n')}
`;
  }

  return prompt;
}

export function buildEvaluationPrompt(request: EvaluationRequest): string {
  return `${describeFacts(request.facts)}

Code:
\`\`\`python
${request.code}
\`\`\`

Docstring (${request.style} style):
${request.candidate}

Review this docstring.`;
}
