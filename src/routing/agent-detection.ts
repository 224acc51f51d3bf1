/**
 * Agent type detection from the system prompt.
 *
 * First agent whose keyword appears in the (lower-cased) first system
 * message wins, so list order matters.
 *
 * @packageDocumentation
 */

import type { ChatMessage } from '../types.js';

export interface AgentPattern {
  agentType: string;
  keywords: string[];
}

export const AGENT_PATTERNS: readonly AgentPattern[] = [
  { agentType: 'chief-architect', keywords: ['chief architect', 'strategic decision'] },
  { agentType: 'tdd-coding-agent', keywords: ['tdd', 'test-driven', 'test-first'] },
  { agentType: 'python-specialist', keywords: ['python specialist', 'fastapi', 'django'] },
  { agentType: 'swift-specialist', keywords: ['swift specialist', 'swiftui', 'ios'] },
  { agentType: 'rust-specialist', keywords: ['rust specialist', 'systems programming'] },
  { agentType: 'go-specialist', keywords: ['go specialist', 'golang', 'microservice'] },
  { agentType: 'flutter-specialist', keywords: ['flutter specialist', 'cross-platform mobile'] },
  { agentType: 'frontend-developer', keywords: ['frontend developer', 'react', 'javascript'] },
  { agentType: 'fullstack-developer', keywords: ['full-stack', 'fullstack'] },
  { agentType: 'devops-engineer', keywords: ['devops', 'docker', 'kubernetes', 'deployment'] },
  { agentType: 'test-engineer', keywords: ['test engineer', 'qa', 'testing', 'test automation'] },
  { agentType: 'test-automator', keywords: ['test automator', 'test automation'] },
  { agentType: 'documentation-expert', keywords: ['documentation', 'technical writer', 'api documenting'] },
  { agentType: 'security-auditor', keywords: ['security', 'vulnerability', 'penetration'] },
  { agentType: 'database-architect', keywords: ['database architect', 'schema design'] },
  { agentType: 'backend-architect', keywords: ['backend architect', 'api design'] },
  { agentType: 'code-reviewer', keywords: ['code review', 'code quality'] },
  { agentType: 'architecture-modernizer', keywords: ['architecture', 'modernization', 'refactor'] },
  { agentType: 'debugger', keywords: ['debugging', 'error analysis'] },
  { agentType: 'performance-engineer', keywords: ['performance', 'optimization', 'profiling'] },
];

export function detectAgentType(
  messages: readonly ChatMessage[],
  patterns: readonly AgentPattern[] = AGENT_PATTERNS,
): string | undefined {
  const system = messages.find((m) => m.role.trim().toLowerCase() === 'system');
  if (!system) return undefined;

  const lower = messageText(system).toLowerCase();
  for (const { agentType, keywords } of patterns) {
    if (keywords.some((k) => lower.includes(k))) {
      return agentType;
    }
  }
  return undefined;
}

/**
 * Plain text of a message: the string itself, or its text blocks joined
 * by newlines.
 */
export function messageText(message: ChatMessage): string {
  if (typeof message.content === 'string') return message.content;
  return message.content
    .map((block) => (block.type === 'text' && typeof block.text === 'string' ? block.text : ''))
    .filter((text) => text.length > 0)
    .join('\n');
}
