/**
 * @folioforge/agents - Agent implementations
 *
 * - shared/     : BaseAgent, LlmAgent and result helpers
 * - profile/    : CV text extraction and analysis (Phase 1)
 * - portfolio/  : HTML portfolio generation (Phase 2)
 */

export * from './shared/index.js';
export * from './profile/index.js';
export * from './portfolio/index.js';
