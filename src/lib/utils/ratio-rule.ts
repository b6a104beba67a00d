/**
 * Component: Ratio Rule Parser
 * Documentation: documentation/cleanup.md
 *
 * Parses expressions such as `<1.0` or `>=2` into a comparator.
 */

import { ConfigurationError } from './errors';

export type RatioQualifier = '<' | '<=' | '>' | '>=';

export interface RatioRule {
  qualifier: RatioQualifier;
  value: number;
}

// `=` is accepted by the pattern so it can be reported as an unsupported qualifier
const RATIO_PATTERN = /^(>|<|<=|>=|=)((?:[0-9]*[.])?[0-9]+)$/;

function isRatioQualifier(value: string): value is RatioQualifier {
  return value === '<' || value === '<=' || value === '>' || value === '>=';
}

export function parseRatioRule(expression: string): RatioRule {
  const match = RATIO_PATTERN.exec(expression.trim());
  if (!match) {
    throw new ConfigurationError(`Invalid ratio format "${expression}"`);
  }

  const [, qualifier, rawValue] = match;
  if (!isRatioQualifier(qualifier)) {
    throw new ConfigurationError(`Invalid ratio qualifier "${qualifier}" in "${expression}"`);
  }

  const value = Number.parseFloat(rawValue);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`Ratio "${rawValue}" is not a number`);
  }

  return { qualifier, value };
}

export function matchesRatioRule(ratio: number, rule: RatioRule): boolean {
  switch (rule.qualifier) {
    case '<':
      return ratio < rule.value;
    case '<=':
      return ratio <= rule.value;
    case '>':
      return ratio > rule.value;
    case '>=':
      return ratio >= rule.value;
  }
}

export function formatRatioRule(rule: RatioRule): string {
  return `${rule.qualifier}${rule.value}`;
}
