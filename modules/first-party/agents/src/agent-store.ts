/**
 * Capstack Agents Module — Agent Store
 *
 * Agents and sessions as JSON records in a KVStore:
 *   agent:<agent_id>
 *   session:<agent_id>:<session_id>
 *
 * Records are parsed on read; a record that no longer matches its schema
 * reads as missing.
 */

import { AgentSchema, SessionSchema } from '@capstack/core';
import type { Agent, Session } from '@capstack/core';
import type { KVStore } from '@capstack/runtime-host';

const agentKey = (agentId: string): string => `agent:${agentId}`;
const sessionPrefix = (agentId: string): string => `session:${agentId}:`;
const sessionKey = (agentId: string, sessionId: string): string => sessionPrefix(agentId) + sessionId;

export class AgentStore {
  constructor(private readonly kv: KVStore) {}

  async getAgent(agentId: string): Promise<Agent | undefined> {
    const parsed = AgentSchema.safeParse(await this.kv.get(agentKey(agentId)));
    return parsed.success ? parsed.data : undefined;
  }

  async putAgent(agent: Agent): Promise<void> {
    await this.kv.set(agentKey(agent.agent_id), agent);
  }

  /** Removes the agent and all of its sessions. */
  async deleteAgent(agentId: string): Promise<void> {
    for (const key of await this.kv.keys(sessionPrefix(agentId))) {
      await this.kv.delete(key);
    }
    await this.kv.delete(agentKey(agentId));
  }

  async getSession(agentId: string, sessionId: string): Promise<Session | undefined> {
    const parsed = SessionSchema.safeParse(await this.kv.get(sessionKey(agentId, sessionId)));
    return parsed.success ? parsed.data : undefined;
  }

  async putSession(session: Session): Promise<void> {
    await this.kv.set(sessionKey(session.agent_id, session.session_id), session);
  }

  async deleteSession(agentId: string, sessionId: string): Promise<void> {
    await this.kv.delete(sessionKey(agentId, sessionId));
  }
}
