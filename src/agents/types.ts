/**
 * A supervised, independently failing unit. `run` resolves when the agent
 * is done (normally after `signal` aborts or `stop` is called); a settled
 * run while the system is up counts as unhealthy.
 */
export interface Agent {
  readonly name: string;
  run(signal: AbortSignal): Promise<void>;
  healthCheck(): Promise<boolean>;
  stop(): Promise<void>;
}

export type AgentFactory = () => Agent;
