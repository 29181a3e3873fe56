/**
 * Agent Loop Module
 *
 * Tool-calling loop over the document tools.
 */

export { AgentProcessor, DEFAULT_AGENT_CONFIG } from './AgentProcessor';
export { AgentStateMachine } from './state-machine';
export { ToolCallParser } from './tool-parser';
export { buildAgentSystemPrompt, DEFAULT_AGENT_PROMPT } from './system-prompt';
export type { AgentPromptContext } from './system-prompt';
export { generateRunId, generateSessionId, parseId, isValidRunId } from './run-id-generator';
export type {
  AgentState,
  AgentErrorCode,
  ChatClient,
  AgentProcessorConfig,
  AgentProcessorOptions,
  AgentRequest,
  ToolCallStatus,
  ToolCallRecord,
  AgentResult,
  AgentEvent,
} from './types';
