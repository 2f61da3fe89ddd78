export { AgentValidationError, BaseAgent, formatZodIssues, unwrapAgentResult } from './base-agent.js';
export { LlmAgent, excerpt, type LlmAgentDeps } from './llm-agent.js';
export type { Agent, AgentConfig, AgentContext, AgentResult, AgentLog } from './types.js';
