/**
 * Capstack Agents Module — Agent Service
 *
 * Serves the `agents` group. Agents and sessions are records in an
 * AgentStore; everything a turn needs from other capability groups goes
 * through the stack client, so each of those calls is routed and logged
 * like any other.
 *
 * A turn:
 *   1. input shields over the new messages; an `error` verdict ends the turn
 *      with the shield's user message as the reply
 *   2. retrieval from the agent's memory banks, inserted as a system message
 *   3. chat completion over instructions, context, session history and input
 *   4. output shields over the reply; an `error` verdict replaces it
 *   5. the turn is appended to the session
 */

import { randomUUID } from 'node:crypto';
import { CapabilityGroup, ConfigError, NotFoundError } from '@capstack/core';
import type {
  Agent,
  AgentConfig,
  AgentIdRequest,
  AgentsApi,
  CompletionMessage,
  CreateAgentRequest,
  CreateAgentResponse,
  CreateSessionRequest,
  CreateSessionResponse,
  CreateTurnRequest,
  CreateTurnResponse,
  EmptyResponse,
  GetAgentResponse,
  GetSessionResponse,
  InvokeOptions,
  Message,
  Session,
  SessionRequest,
  ShieldVerdict,
  StackClient,
  Step,
  Turn,
} from '@capstack/core';
import { KeyedLock } from '@capstack/runtime-host';
import type { AgentStore } from './agent-store.js';
import { formatRetrievedContext, selectChunks } from './retrieval.js';
import type { ScoredChunk } from './retrieval.js';

export const DEFAULT_MAX_MEMORY_CHUNKS = 3;

export interface AgentServiceOptions {
  readonly store: AgentStore;
  /** Client bound to the stack's Router. */
  readonly client: StackClient;
  /** Capability groups bound in the stack. */
  readonly groups: ReadonlySet<CapabilityGroup>;
  readonly provider_id: string;
  /** Log span_start / span_end telemetry events around each turn. */
  readonly trace_turns?: boolean;
  readonly now?: () => Date;
  readonly newId?: () => string;
}

export class AgentService implements AgentsApi {
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly sessionLock = new KeyedLock();

  constructor(private readonly options: AgentServiceOptions) {
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  // -------------------------------------------------------------------------
  // Agents
  // -------------------------------------------------------------------------

  async create_agent(request: CreateAgentRequest): Promise<CreateAgentResponse> {
    this.checkDependencies(request.agent_config);
    const agent: Agent = {
      agent_id: this.newId(),
      agent_config: request.agent_config,
      created_at: this.now().toISOString(),
    };
    await this.options.store.putAgent(agent);
    return { agent_id: agent.agent_id };
  }

  async get_agent(request: AgentIdRequest): Promise<GetAgentResponse> {
    return { agent: await this.requireAgent(request.agent_id) };
  }

  async delete_agent(request: AgentIdRequest): Promise<EmptyResponse> {
    await this.requireAgent(request.agent_id);
    await this.options.store.deleteAgent(request.agent_id);
    return {};
  }

  // -------------------------------------------------------------------------
  // Sessions
  // -------------------------------------------------------------------------

  async create_session(request: CreateSessionRequest): Promise<CreateSessionResponse> {
    await this.requireAgent(request.agent_id);
    const session: Session = {
      session_id: this.newId(),
      session_name: request.session_name,
      agent_id: request.agent_id,
      turns: [],
      started_at: this.now().toISOString(),
    };
    await this.options.store.putSession(session);
    return { session_id: session.session_id };
  }

  async get_session(request: SessionRequest): Promise<GetSessionResponse> {
    return { session: await this.requireSession(request.agent_id, request.session_id) };
  }

  async delete_session(request: SessionRequest): Promise<EmptyResponse> {
    await this.requireSession(request.agent_id, request.session_id);
    await this.options.store.deleteSession(request.agent_id, request.session_id);
    return {};
  }

  // -------------------------------------------------------------------------
  // Turns
  // -------------------------------------------------------------------------

  async create_turn(request: CreateTurnRequest, options: InvokeOptions): Promise<CreateTurnResponse> {
    const agent = await this.requireAgent(request.agent_id);
    const session = await this.requireSession(request.agent_id, request.session_id);
    const client = this.options.client.withOptions({ signal: options.signal });
    const turnId = this.newId();
    const startedAt = this.now().toISOString();

    await this.trace(client, turnId, 'span_start', request);
    const steps: Step[] = [];
    const output = await this.runTurn(client, agent.agent_config, session, request.messages, steps);

    const turn: Turn = {
      turn_id: turnId,
      session_id: request.session_id,
      input_messages: request.messages,
      steps,
      output_message: output,
      started_at: startedAt,
      completed_at: this.now().toISOString(),
    };
    await this.appendTurn(request.agent_id, request.session_id, turn);
    await this.trace(client, turnId, 'span_end', request);
    return { turn };
  }

  private async runTurn(
    client: StackClient,
    config: AgentConfig,
    session: Session,
    input: ReadonlyArray<Message>,
    steps: Step[],
  ): Promise<CompletionMessage> {
    const blockedInput = await this.runShields(client, config.input_shields ?? [], input, steps);
    if (blockedInput !== undefined) return refusal(blockedInput);

    const messages: Message[] = [];
    if (config.instructions !== '') {
      messages.push({ role: 'system', content: config.instructions });
    }
    const context = await this.retrieve(client, config, input, steps);
    if (context !== '') {
      messages.push({ role: 'system', content: context });
    }
    messages.push(...history(session), ...input);

    const { completion_message } = await client.inference.chat_completion({
      model: config.model,
      messages,
      sampling_params: config.sampling_params,
    });
    steps.push({ step_type: 'inference', model: config.model, completion_message });

    const blockedOutput = await this.runShields(
      client,
      config.output_shields ?? [],
      [...input, { role: 'assistant', content: completion_message.content }],
      steps,
    );
    if (blockedOutput !== undefined) return refusal(blockedOutput);
    return completion_message;
  }

  /** Runs shields in order; returns the first `error` verdict, if any. */
  private async runShields(
    client: StackClient,
    names: ReadonlyArray<string>,
    messages: ReadonlyArray<Message>,
    steps: Step[],
  ): Promise<ShieldVerdict | undefined> {
    for (const name of names) {
      const { shield_type, params } = await this.resolveShield(client, name);
      const verdict = await client.safety.run_shield({ shield_type, messages: [...messages], params });
      steps.push({ step_type: 'shield_call', shield: name, verdict });
      if (verdict.violation_level === 'error') return verdict;
    }
    return undefined;
  }

  /**
   * A name registered in the shields group resolves to its type and params;
   * any other name is taken as a shield type.
   */
  private async resolveShield(
    client: StackClient,
    name: string,
  ): Promise<{ shield_type: string; params: Record<string, unknown> }> {
    if (this.options.groups.has(CapabilityGroup.Shields)) {
      const { shield } = await client.shields.get_shield({ identifier: name });
      if (shield !== null) return { shield_type: shield.shield_type, params: shield.params };
    }
    return { shield_type: name, params: {} };
  }

  private async retrieve(
    client: StackClient,
    config: AgentConfig,
    input: ReadonlyArray<Message>,
    steps: Step[],
  ): Promise<string> {
    const bankIds = config.memory_bank_ids ?? [];
    const query = input.filter((m) => m.role === 'user' && m.content.trim() !== '').map((m) => m.content);
    if (bankIds.length === 0 || query.length === 0) return '';

    const limit = config.max_memory_chunks ?? DEFAULT_MAX_MEMORY_CHUNKS;
    const hits: ScoredChunk[] = [];
    for (const bankId of bankIds) {
      const result = await client.memory.query_documents({ bank_id: bankId, query, params: { max_chunks: limit } });
      result.chunks.forEach((chunk, i) => hits.push({ chunk, score: result.scores[i] ?? 0 }));
    }

    const context = formatRetrievedContext(selectChunks(hits, limit));
    steps.push({ step_type: 'memory_retrieval', memory_bank_ids: [...bankIds], inserted_context: context });
    return context;
  }

  // -------------------------------------------------------------------------
  // Internal helpers
  // -------------------------------------------------------------------------

  private checkDependencies(config: AgentConfig): void {
    const shields = (config.input_shields?.length ?? 0) + (config.output_shields?.length ?? 0);
    if (shields > 0 && !this.options.groups.has(CapabilityGroup.Safety)) {
      throw this.missing(CapabilityGroup.Safety, 'shields');
    }
    if ((config.memory_bank_ids?.length ?? 0) > 0 && !this.options.groups.has(CapabilityGroup.Memory)) {
      throw this.missing(CapabilityGroup.Memory, 'memory banks');
    }
  }

  private missing(group: CapabilityGroup, feature: string): ConfigError {
    return new ConfigError(
      'MissingDependency',
      `Agent config uses ${feature} but the stack has no ${group} provider`,
      { capability: CapabilityGroup.Agents, provider_id: this.options.provider_id },
    );
  }

  private async requireAgent(agentId: string): Promise<Agent> {
    const agent = await this.options.store.getAgent(agentId);
    if (agent === undefined) {
      throw new NotFoundError('Agent', `Agent '${agentId}' does not exist`);
    }
    return agent;
  }

  private async requireSession(agentId: string, sessionId: string): Promise<Session> {
    const session = await this.options.store.getSession(agentId, sessionId);
    if (session === undefined) {
      throw new NotFoundError('Session', `Session '${sessionId}' of agent '${agentId}' does not exist`);
    }
    return session;
  }

  /** Re-reads the session so concurrent turns do not overwrite each other. */
  private appendTurn(agentId: string, sessionId: string, turn: Turn): Promise<void> {
    return this.sessionLock.run(`${agentId}/${sessionId}`, async () => {
      const session = await this.requireSession(agentId, sessionId);
      await this.options.store.putSession({ ...session, turns: [...session.turns, turn] });
    });
  }

  private async trace(
    client: StackClient,
    turnId: string,
    type: 'span_start' | 'span_end',
    request: CreateTurnRequest,
  ): Promise<void> {
    if (this.options.trace_turns !== true) return;
    await client.telemetry.log_event({
      event: {
        trace_id: turnId,
        type,
        timestamp: this.now().toISOString(),
        message: type === 'span_start' ? 'turn started' : 'turn completed',
        attributes: { agent_id: request.agent_id, session_id: request.session_id },
      },
    });
  }
}

function history(session: Session): Message[] {
  return session.turns.flatMap((turn) => [
    ...turn.input_messages,
    { role: 'assistant' as const, content: turn.output_message.content },
  ]);
}

function refusal(verdict: ShieldVerdict): CompletionMessage {
  return { role: 'assistant', content: verdict.user_message, stop_reason: 'end_of_turn' };
}
