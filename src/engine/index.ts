export { computeEmissions } from './estimate';
export { createActivityInput, assertValidActivityInput, ActivityInputSchema } from './activity';
export { selectRecommendations } from './recommend';
export type { RecommendationMetrics } from './recommend';
export { summarizeIntensity, classifyIntensity, REDUCTION_POTENTIAL_PERCENT } from './intensity';
export { getCurrentSeason } from './season';
export { AppError, ValidationError, ConfigurationError } from './errors';
export type { FieldIssue } from './errors';
