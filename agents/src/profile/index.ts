/**
 * Profile-related agents.
 *
 * Agents in this module:
 * - DocumentExtractorAgent: CV PDF -> raw text
 * - CvAnalyzerAgent: raw text -> StructuredCV (Phase 1)
 */

export * from './document-extractor/index.js';
export * from './cv-analyzer/index.js';
