import type { RecommendationMetric, RecommendationRule } from '../models/EmissionFactorTable';

/**
 * Värden som reglerna jämförs mot (kg CO2e)
 */
export type RecommendationMetrics = Readonly<Record<RecommendationMetric, number>>;

/**
 * Välj rekommendationstaggar
 *
 * Reglerna utvärderas i deklarationsordning. En regel matchar när
 * metric > threshold. Varje tagg förekommer högst en gång, på platsen
 * för den första regel som gav den.
 */
export function selectRecommendations(
  metrics: RecommendationMetrics,
  rules: readonly RecommendationRule[]
): string[] {
  const seen = new Set<string>();
  const tags: string[] = [];

  for (const rule of rules) {
    if (metrics[rule.metric] > rule.threshold && !seen.has(rule.tag)) {
      seen.add(rule.tag);
      tags.push(rule.tag);
    }
  }

  return tags;
}
