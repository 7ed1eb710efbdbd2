import { z } from "zod";
import { AGENT_STATUSES, type AgentRecord, type Registry } from "./types.js";

/** On-disk record shape: `{name, pid, log, prompt, status, started}`. */
const AgentDocumentSchema = z.object({
  name: z.string().regex(/^[A-Za-z0-9_-]+$/),
  pid: z.number().int().positive(),
  log: z.string(),
  prompt: z.string(),
  status: z.enum(AGENT_STATUSES),
  started: z.string(),
  type: z.string().optional(),
});

export const RegistryDocumentSchema = z.object({
  agents: z.array(AgentDocumentSchema),
});

export type RegistryDocument = z.infer<typeof RegistryDocumentSchema>;

export function fromDocument(doc: RegistryDocument): Registry {
  return {
    agents: doc.agents.map((agent) => ({
      name: agent.name,
      pid: agent.pid,
      logPath: agent.log,
      promptPath: agent.prompt,
      status: agent.status,
      startedAt: agent.started,
      ...(agent.type !== undefined ? { type: agent.type } : {}),
    })),
  };
}

export function toDocument(registry: Registry): RegistryDocument {
  return {
    agents: registry.agents.map((agent: AgentRecord) => ({
      name: agent.name,
      pid: agent.pid,
      log: agent.logPath,
      prompt: agent.promptPath,
      status: agent.status,
      started: agent.startedAt,
      ...(agent.type !== undefined ? { type: agent.type } : {}),
    })),
  };
}

/** Duplicate names make the document ambiguous; report the first one found. */
export function findDuplicateName(doc: RegistryDocument): string | undefined {
  const seen = new Set<string>();
  for (const agent of doc.agents) {
    if (seen.has(agent.name)) return agent.name;
    seen.add(agent.name);
  }
  return undefined;
}
