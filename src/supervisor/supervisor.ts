import type { Agent, AgentFactory } from '../agents/types';
import type { MessageBus, Unsubscribe } from '../bus/messageBus';
import { errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { NotificationSink } from '../notifications';
import type { PortfolioLedger } from '../portfolio/ledger';
import type { RebalanceSuggestion } from '../types';
import { sleep, withTimeout } from '../utils/async';

export type AgentState = 'created' | 'running' | 'unhealthy' | 'restarting' | 'stopping' | 'stopped';

interface AgentRecord {
  name: string;
  factory: AgentFactory;
  agent: Agent;
  state: AgentState;
  healthy: boolean;
  restartCount: number;
  lastError?: string;
  task: Promise<void>;
  settled: boolean;
  controller: AbortController;
  restarting: boolean;
}

export interface AgentStatus {
  name: string;
  state: AgentState;
  healthy: boolean;
  restartCount: number;
  lastError?: string;
}

export interface StatusReport {
  uptimeMs: number;
  activeAgents: number;
  totalAgents: number;
  lastHealthCheck: number | null;
  recentErrors: number;
  dailyPnl: number;
  tradeCount: number;
  winRate: number;
  openPositions: number;
  agents: AgentStatus[];
}

export interface SupervisorOptions {
  healthIntervalMs: number;
  statusIntervalMs: number;
  stopTimeoutMs: number;
}

export interface SupervisorDeps {
  bus: MessageBus;
  ledger: PortfolioLedger;
  notifier: NotificationSink;
  logger: Logger;
}

function formatDuration(ms: number): string {
  const minutes = Math.floor(ms / 60_000);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);
  if (days > 0) return `${days}d ${hours % 24}h`;
  if (hours > 0) return `${hours}h ${minutes % 60}m`;
  return `${minutes}m`;
}

export function formatStatusReport(report: StatusReport): string {
  const lastCheck = report.lastHealthCheck ? new Date(report.lastHealthCheck).toISOString() : 'never';
  return [
    '📊 Status digest',
    `Uptime: ${formatDuration(report.uptimeMs)}`,
    `Agents: ${report.activeAgents}/${report.totalAgents} active`,
    `Last health check: ${lastCheck}`,
    `Recent errors: ${report.recentErrors}`,
    `Daily P&L: ${report.dailyPnl.toFixed(2)}`,
    `Trades: ${report.tradeCount} | Win rate: ${(report.winRate * 100).toFixed(1)}%`,
    `Open positions: ${report.openPositions}`,
  ].join('\n');
}

export function formatRebalanceSuggestion(suggestion: RebalanceSuggestion): string {
  const pct = (value: number): string => `${(value * 100).toFixed(1)}%`;
  return (
    `⚖️ Rebalance suggested: ${suggestion.side} ${suggestion.quantity.toFixed(6)} ${suggestion.symbol} @ ${suggestion.price}` +
    ` (weight ${pct(suggestion.currentWeight)}, target ${pct(suggestion.targetWeight)})`
  );
}

/**
 * Owns every agent through its registered factory. A failed health check
 * stops the agent (bounded), builds a fresh one from the same factory and
 * runs it; at most one restart per agent is in flight. Shutdown runs once.
 */
export class Supervisor {
  private readonly factories = new Map<string, AgentFactory>();
  private readonly records: AgentRecord[] = [];
  private readonly loops = new AbortController();
  private loopTasks: Promise<void>[] = [];
  private readonly errorTimes: number[] = [];
  private running = false;
  private startedAt = 0;
  private lastHealthCheck: number | null = null;
  private shutdownPromise: Promise<void> | null = null;
  private unsubscribeRebalance: Unsubscribe | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly deps: SupervisorDeps,
    private readonly options: SupervisorOptions,
  ) {
    this.logger = deps.logger.child('supervisor');
  }

  register(name: string, factory: AgentFactory): void {
    if (this.running || this.shutdownPromise) {
      throw new Error(`cannot register '${name}' after start`);
    }
    if (this.factories.has(name)) {
      throw new Error(`agent '${name}' is already registered`);
    }
    this.factories.set(name, factory);
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running || this.shutdownPromise) {
      throw new Error('supervisor already started');
    }

    const constructed: { name: string; factory: AgentFactory; agent: Agent }[] = [];
    for (const [name, factory] of this.factories) {
      try {
        constructed.push({ name, factory, agent: factory() });
      } catch (error) {
        this.logger.error(`Agent '${name}' failed to construct: ${errorMessage(error)}`);
        await Promise.all(constructed.map(({ name: built, agent }) => this.stopQuietly(built, agent)));
        throw new Error(`startup aborted: agent '${name}' failed to construct: ${errorMessage(error)}`);
      }
    }

    this.running = true;
    this.startedAt = Date.now();
    for (const { name, factory, agent } of constructed) {
      const record: AgentRecord = {
        name,
        factory,
        agent,
        state: 'created',
        healthy: true,
        restartCount: 0,
        task: Promise.resolve(),
        settled: false,
        controller: new AbortController(),
        restarting: false,
      };
      this.records.push(record);
      this.launch(record);
    }

    // Suggestions are advisory: the operator decides whether to reduce.
    this.unsubscribeRebalance = this.deps.bus.subscribe('rebalance_suggestions', (suggestion) =>
      this.deps.notifier.sendMessage(formatRebalanceSuggestion(suggestion)),
    );
    this.loopTasks = [this.healthLoop(this.loops.signal), this.statusLoop(this.loops.signal)];
    this.logger.info(`🚀 Started ${this.records.length} agent(s): ${this.records.map((r) => r.name).join(', ')}`);
    await this.deps.notifier.sendMessage(`🚀 System started with ${this.records.length} agents`);
  }

  /** One health pass; the loop calls this every health interval. */
  async runHealthChecks(): Promise<void> {
    if (!this.running) return;
    this.lastHealthCheck = Date.now();
    this.deps.bus.ensureConnected();

    await Promise.all(
      this.records.map(async (record) => {
        if (record.restarting || record.state === 'stopping' || record.state === 'stopped') return;
        record.healthy = await this.checkHealth(record);
        if (!record.healthy && this.running) {
          record.state = 'unhealthy';
          this.logger.warn(`Agent '${record.name}' is unhealthy${record.lastError ? `: ${record.lastError}` : ''}`);
          await this.restart(record);
        }
      }),
    );
  }

  statusReport(): StatusReport {
    const state = this.deps.ledger.getState();
    return {
      uptimeMs: this.running ? Date.now() - this.startedAt : 0,
      activeAgents: this.records.filter((record) => record.state === 'running').length,
      totalAgents: this.records.length,
      lastHealthCheck: this.lastHealthCheck,
      recentErrors: this.recentErrorCount(),
      dailyPnl: state.dailyPnl,
      tradeCount: state.metrics.tradeCount,
      winRate: state.metrics.winRate,
      openPositions: Object.keys(state.positions).length,
      agents: this.records.map(({ name, state: agentState, healthy, restartCount, lastError }) => ({
        name,
        state: agentState,
        healthy,
        restartCount,
        lastError,
      })),
    };
  }

  /** Every call returns the same promise; the sequence runs once. */
  shutdown(reason = 'shutdown requested'): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.performShutdown(reason);
    }
    return this.shutdownPromise;
  }

  private async performShutdown(reason: string): Promise<void> {
    this.logger.info(`🛑 Shutting down: ${reason}`);
    this.running = false;
    this.loops.abort();
    this.unsubscribeRebalance?.();
    this.unsubscribeRebalance = null;
    await Promise.all(this.loopTasks);

    const outcomes = await Promise.all(
      this.records.map(async (record) => {
        record.state = 'stopping';
        const clean = await this.stopRecord(record);
        record.state = 'stopped';
        return { name: record.name, clean };
      }),
    );

    const timedOut = outcomes.filter((outcome) => !outcome.clean).map((outcome) => outcome.name);
    if (timedOut.length > 0) {
      this.logger.error(`Agents force-stopped after timeout: ${timedOut.join(', ')}`);
    }
    const suffix = timedOut.length > 0 ? ` (force-stopped: ${timedOut.join(', ')})` : '';
    await this.deps.notifier.sendMessage(`🛑 System stopped: ${reason}${suffix}`);
    this.logger.info('✅ Shutdown complete');
  }

  private launch(record: AgentRecord): void {
    const controller = new AbortController();
    record.controller = controller;
    record.settled = false;
    record.state = 'running';
    record.healthy = true;
    const agent = record.agent;

    record.task = agent.run(controller.signal).then(
      () => {
        if (record.agent !== agent) return;
        record.settled = true;
        if (this.running && !controller.signal.aborted) {
          record.lastError = 'run() returned while the system is running';
          this.logger.warn(`Agent '${record.name}' exited unexpectedly`);
        }
      },
      (error: unknown) => {
        if (record.agent !== agent) return;
        record.settled = true;
        record.lastError = errorMessage(error);
        this.recordError();
        this.logger.error(`Agent '${record.name}' crashed: ${record.lastError}`);
      },
    );
  }

  private async checkHealth(record: AgentRecord): Promise<boolean> {
    if (record.settled) return false;
    try {
      return await withTimeout(record.agent.healthCheck(), this.options.stopTimeoutMs, `${record.name} health check`);
    } catch (error) {
      record.lastError = errorMessage(error);
      this.recordError();
      return false;
    }
  }

  private async restart(record: AgentRecord): Promise<void> {
    if (record.restarting) return;
    record.restarting = true;
    record.state = 'restarting';
    record.restartCount += 1;

    try {
      await this.stopRecord(record);
      if (!this.running) return;
      record.agent = record.factory();
      this.launch(record);
      this.logger.info(`🔄 Restarted '${record.name}' (restart #${record.restartCount})`);
      await this.deps.notifier.sendMessage(`🔄 Agent ${record.name} restarted (#${record.restartCount})`);
    } catch (error) {
      record.state = 'unhealthy';
      record.lastError = errorMessage(error);
      this.recordError();
      this.logger.error(`Restart of '${record.name}' failed, retrying next health pass: ${record.lastError}`);
    } finally {
      record.restarting = false;
    }
  }

  /** False when stop() or the run task overran the grace timeout. */
  private async stopRecord(record: AgentRecord): Promise<boolean> {
    let clean = true;
    const ms = this.options.stopTimeoutMs;
    try {
      await withTimeout(record.agent.stop(), ms, `${record.name}.stop()`);
    } catch (error) {
      clean = false;
      this.logger.warn(`Stopping '${record.name}': ${errorMessage(error)}`);
    }
    record.controller.abort();
    try {
      await withTimeout(record.task, ms, `${record.name} task`);
    } catch (error) {
      clean = false;
      this.logger.warn(`'${record.name}' did not finish: ${errorMessage(error)}`);
    }
    return clean;
  }

  private async stopQuietly(name: string, agent: Agent): Promise<void> {
    try {
      await withTimeout(agent.stop(), this.options.stopTimeoutMs, `${name}.stop()`);
    } catch (error) {
      this.logger.warn(`Stopping '${name}' after failed startup: ${errorMessage(error)}`);
    }
  }

  private async healthLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(this.options.healthIntervalMs, signal);
      if (signal.aborted) break;
      try {
        await this.runHealthChecks();
      } catch (error) {
        this.recordError();
        this.logger.error(`Health pass failed: ${errorMessage(error)}`);
      }
    }
  }

  private async statusLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(this.options.statusIntervalMs, signal);
      if (signal.aborted) break;
      await this.deps.notifier.sendMessage(formatStatusReport(this.statusReport()));
    }
  }

  private recordError(): void {
    this.errorTimes.push(Date.now());
    this.recentErrorCount();
  }

  /** Errors within the last digest period; older entries are pruned. */
  private recentErrorCount(): number {
    const cutoff = Date.now() - this.options.statusIntervalMs;
    while (this.errorTimes.length > 0 && (this.errorTimes[0] ?? 0) < cutoff) {
      this.errorTimes.shift();
    }
    return this.errorTimes.length;
  }
}
