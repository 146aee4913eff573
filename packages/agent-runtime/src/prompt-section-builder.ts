import type { ToolDefinition } from '@parley/core';

/** Wraps content in XML-style section tags. */
export function section(name: string, content: string): string {
  return `<${name}>\n${content}\n</${name}>`;
}

/** Formats tool definitions as an `<available-tools>` section. */
export function formatToolsSummary(tools: ToolDefinition[]): string {
  if (tools.length === 0) return '';
  const lines = tools.map((t) => `- ${t.name}: ${t.description}`);
  return section('available-tools', lines.join('\n'));
}

export const TOOL_USE_POLICY = [
  'You are a helpful assistant in a multi-turn conversation.',
  'Use web_search for current events and facts that may have changed recently.',
  'Use the trends and news tools for trending topics or news.',
  'Otherwise answer directly from your own knowledge and the conversation so far. Do not call tools for greetings, definitions or general explanations.',
  'If a tool reports that it is unavailable, answer as well as you can without it and say so briefly.',
].join('\n');

/** System prompt: the tool-use policy followed by the tools available this turn. */
export function buildSystemPrompt(tools: ToolDefinition[], policy: string = TOOL_USE_POLICY): string {
  const toolsSection = formatToolsSummary(tools);
  return toolsSection ? `${section('policy', policy)}\n\n${toolsSection}` : section('policy', policy);
}
