import type { Transporter } from 'nodemailer';
import type { Logger } from 'pino';
import type { AgentConfig } from '../config/agent.js';
import { createLocationResolver } from '../tools/location.js';
import { createMailSender } from '../tools/mailer.js';
import { createPageFetcher } from '../tools/page_fetcher.js';
import { createSearchClient } from '../tools/search.js';
import type { FetchLike } from '../util/fetch.js';
import type { HumanGate } from './consent.js';
import { createGenerator } from './llm.js';
import { ConciergeAgent, type SummaryListener } from './orchestrator.js';
import type { StatusListener } from './pipeline_status.js';

export interface AgentWiring {
  log: Logger;
  gate: HumanGate;
  onStatus?: StatusListener;
  onSummary?: SummaryListener;
  /** Shared by every HTTP collaborator; undici's fetch when omitted. */
  fetchImpl?: FetchLike;
  mailTransport?: Transporter;
}

/** Builds the concrete collaborators named by the configuration and hands them to a new agent. */
export function buildConciergeAgent(cfg: AgentConfig, wiring: AgentWiring): ConciergeAgent {
  const { log, fetchImpl } = wiring;
  return new ConciergeAgent({
    llm: createGenerator(cfg.llm, { log, fetchImpl }),
    search: createSearchClient(cfg.search, { log, fetchImpl }),
    fetcher: createPageFetcher(cfg.fetch, { log, fetchImpl }),
    location: createLocationResolver(cfg.location, { log, fetchImpl }),
    mailer: createMailSender(cfg.smtp, { log, transport: wiring.mailTransport }),
    gate: wiring.gate,
    log,
    onStatus: wiring.onStatus,
    onSummary: wiring.onSummary,
  });
}
