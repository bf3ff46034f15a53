export const AGENT_CONFIG = {
  maxRetries: 2,
  timeoutMs: 60000,
  maxTokens: 2048,
} as const;

export type AgentConfig = {
  maxRetries: number;
  timeoutMs: number;
  maxTokens: number;
};
