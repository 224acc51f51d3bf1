/**
 * Router
 *
 * Turns a request's model and agent type into an ordered fallback chain of
 * (provider, model) targets. Agent rules come first, then tier and model
 * rules by descending priority, then the default provider. Duplicates and
 * unavailable providers are dropped; unhealthy providers move to the end.
 *
 * @packageDocumentation
 */

import { parseFallbackRef, type GatewayConfig, type RoutingRule } from '../config.js';
import { NoRouteError } from '../errors.js';
import type { CostCalculator } from '../pricing/cost.js';
import type { ProviderHealth } from '../providers/health.js';
import type { ProviderRegistry } from '../providers/registry.js';

export type RouteReason = 'agent' | 'tier' | 'model' | 'default' | 'fallback';

export interface ProviderTarget {
  providerId: string;
  /** Upstream model id to send */
  model: string;
  reason: RouteReason;
}

export interface RouteContext {
  model: string;
  agentType?: string;
}

interface CompiledRule {
  rule: RoutingRule;
  index: number;
  pattern?: RegExp;
}

export interface RouterDeps {
  registry: ProviderRegistry;
  costs: CostCalculator;
  health?: ProviderHealth;
}

export class Router {
  private readonly agentRules: CompiledRule[];
  private readonly modelRules: CompiledRule[];
  private readonly defaultProvider: string;
  private readonly defaultModel: string | undefined;
  private readonly deps: RouterDeps;

  constructor(routing: GatewayConfig['routing'], deps: RouterDeps) {
    const compiled = routing.rules.map((rule, index): CompiledRule =>
      rule.match === 'model' ? { rule, index, pattern: new RegExp(rule.pattern) } : { rule, index },
    );

    this.agentRules = compiled.filter((c) => c.rule.match === 'agent').sort(byPriority);
    this.modelRules = compiled.filter((c) => c.rule.match !== 'agent').sort(byPriority);
    this.defaultProvider = routing.defaultProvider;
    this.defaultModel = routing.defaultModel;
    this.deps = deps;
  }

  /**
   * Build the fallback chain. Throws NoRouteError when nothing usable is
   * left.
   */
  route(ctx: RouteContext): ProviderTarget[] {
    const requested = ctx.model.trim();
    const candidates: ProviderTarget[] = [];

    const agentType = ctx.agentType?.trim().toLowerCase();
    if (agentType) {
      for (const { rule } of this.agentRules) {
        if (rule.match === 'agent' && rule.agentType.toLowerCase() === agentType) {
          pushRule(candidates, rule, requested, 'agent');
        }
      }
    }

    const tier = this.deps.costs.tierFor(requested);
    for (const { rule, pattern } of this.modelRules) {
      if (rule.match === 'tier' && rule.tier === tier) {
        pushRule(candidates, rule, requested, 'tier');
      } else if (rule.match === 'model' && pattern?.test(requested)) {
        pushRule(candidates, rule, requested, 'model');
      }
    }

    candidates.push({ providerId: this.defaultProvider, model: this.defaultModel ?? requested, reason: 'default' });

    const seen = new Set<string>();
    const chain: ProviderTarget[] = [];
    for (const target of candidates) {
      const id = `${target.providerId}\u0000${target.model}`;
      if (seen.has(id) || !this.deps.registry.isAvailable(target.providerId)) continue;
      seen.add(id);
      chain.push(target);
    }

    if (chain.length === 0) {
      throw new NoRouteError(requested);
    }
    return this.deps.health ? this.deps.health.order(chain) : chain;
  }
}

function pushRule(out: ProviderTarget[], rule: RoutingRule, requested: string, reason: RouteReason): void {
  const model = rule.model ?? requested;
  out.push({ providerId: rule.provider, model, reason });
  for (const ref of rule.fallbacks) {
    const fallback = parseFallbackRef(ref);
    out.push({ providerId: fallback.provider, model: fallback.model ?? model, reason: 'fallback' });
  }
}

function byPriority(a: CompiledRule, b: CompiledRule): number {
  return b.rule.priority - a.rule.priority || a.index - b.index;
}
