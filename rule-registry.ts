import { UnknownSymbolError } from './errors';
import type { AssetRule, RuleRegistry } from './types';

export class StaticRuleRegistry implements RuleRegistry {
  private readonly rules: ReadonlyMap<string, AssetRule>;

  constructor(rules: AssetRule[]) {
    this.rules = new Map(rules.map((rule) => [rule.symbol, Object.freeze({ ...rule })]));
  }

  getRule(symbol: string): AssetRule {
    const rule = this.rules.get(symbol);
    if (!rule) {
      throw new UnknownSymbolError(symbol);
    }
    return rule;
  }

  symbols(): string[] {
    return [...this.rules.keys()];
  }
}
