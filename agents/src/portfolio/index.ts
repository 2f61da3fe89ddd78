/**
 * Portfolio agents.
 *
 * - PortfolioGeneratorAgent: StructuredCV -> single-page HTML (Phase 2)
 */

export * from './portfolio-generator/index.js';
