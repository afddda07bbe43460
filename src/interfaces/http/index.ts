export { default as analysisRoutes } from './analysis-routes.js';
export type { AnalysisRoutesOptions } from './analysis-routes.js';
