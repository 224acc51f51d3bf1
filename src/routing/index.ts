/**
 * Routing module exports.
 *
 * @packageDocumentation
 */

export { detectAgentType, messageText, AGENT_PATTERNS } from './agent-detection.js';
export type { AgentPattern } from './agent-detection.js';
export { Router } from './router.js';
export type { ProviderTarget, RouteContext, RouteReason, RouterDeps } from './router.js';
