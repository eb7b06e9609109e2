import type { Logger } from 'pino';
import type { EmailDecision } from '../schemas/email.js';
import { errorMessage, isErrorText } from '../tools/errors.js';
import type { LocationResolver } from '../tools/location.js';
import type { MailSender } from '../tools/mailer.js';
import type { PageFetcher } from '../tools/page_fetcher.js';
import { formatSearchResults, type SearchClient } from '../tools/search.js';
import { isAffirmative, type HumanGate } from './consent.js';
import { draftEmail } from './email_drafter.js';
import { extractEmailAddress, NO_RECIPIENT } from './email_extractor.js';
import { augmentGoal } from './goal_augmenter.js';
import { ConversationHistory } from './history.js';
import type { LlmStageDeps, TextGenerator } from './llm.js';
import type { PipelineStageKey, StatusListener } from './pipeline_status.js';
import { planSearchQuery } from './query_planner.js';
import { BROWSE_FAILED_MESSAGE, researchPages, type ResearchEntry } from './researcher.js';
import { synthesizeSummary } from './synthesizer.js';
import { selectUrls, summarizeSnippets } from './url_selector.js';

export type SummaryListener = (summary: string) => void | Promise<void>;

export interface AgentDeps {
  llm: TextGenerator;
  search: SearchClient;
  fetcher: PageFetcher;
  location: LocationResolver;
  mailer: MailSender;
  gate: HumanGate;
  log: Logger;
  onStatus?: StatusListener;
  /** Shows the turn's reply. Called once per turn, before any confirmation question. */
  onSummary?: SummaryListener;
}

export type TurnExit = 'completed' | 'snippet-fallback' | 'browse-failed' | 'failed';

export interface TurnResult {
  /** Text recorded as the agent's side of the turn. */
  summary: string;
  exit: TurnExit;
  effectiveGoal: string;
  query?: string;
  emailSent: boolean;
}

export const TURN_FAILED_MESSAGE = 'Sorry, something went wrong while working on that. Please try again.';

/**
 * What one turn has learned so far. Each stage reads the fields before it
 * and fills in its own.
 */
interface TurnState {
  readonly utterance: string;
  goal: string;
  recipient: string;
  query?: string;
  searchText?: string;
  urls?: string[];
  research?: ResearchEntry[];
  summary?: string;
  /** Reply already handed to onSummary. */
  shown?: string;
}

/**
 * Runs the research pipeline one turn at a time and owns the session history.
 *
 * ExtractEmail → CheckLocation → PlanQuery → Search → SelectURLs, then either
 * the snippet-only summary (no URLs) or Browse → Synthesize → DraftEmail →
 * ConfirmAndSend. Mail goes out only after the user says yes.
 */
export class ConciergeAgent {
  readonly history = new ConversationHistory();
  private readonly stage: LlmStageDeps;

  constructor(private readonly deps: AgentDeps) {
    this.stage = { llm: deps.llm, log: deps.log };
  }

  /**
   * Never rejects. Whatever path the turn takes, the reply is shown once
   * and history grows by the utterance and the returned summary.
   */
  async runTurn(utterance: string): Promise<TurnResult> {
    const state: TurnState = { utterance, goal: utterance, recipient: NO_RECIPIENT };
    let result: TurnResult;
    try {
      result = await this.execute(state);
    } catch (error) {
      this.deps.log.error({ error: errorMessage(error) }, 'turn_failed');
      result = { summary: TURN_FAILED_MESSAGE, exit: 'failed', effectiveGoal: utterance, emailSent: false };
    }
    if (state.shown !== result.summary) await this.present(state, result.summary);
    this.history.recordTurn(utterance, result.summary);
    return result;
  }

  private async execute(state: TurnState): Promise<TurnResult> {
    const { log } = this.deps;

    this.status('extract-email', 'Looking for an email address in your request...');
    state.recipient = await extractEmailAddress(state.goal, this.stage);

    this.status('check-location', 'Checking whether your request needs a location...');
    state.goal = (await augmentGoal(state.goal, { ...this.stage, location: this.deps.location })).goal;

    this.status('plan-query', 'Planning the search...');
    state.query = await planSearchQuery(state.goal, this.history.render(), this.stage);

    this.status('search', `Searching the web for "${state.query}"...`);
    state.searchText = formatSearchResults(await this.deps.search.search(state.query));

    this.status('select-urls', 'Choosing which pages to read...');
    state.urls = await selectUrls(state.goal, state.searchText, this.stage);

    if (state.urls.length === 0) {
      const summary = await summarizeSnippets(state.goal, state.searchText, this.stage);
      return this.finish(state, summary, 'snippet-fallback', false);
    }

    const total = state.urls.length;
    state.research = await researchPages(state.urls, {
      fetcher: this.deps.fetcher,
      log,
      onPage: (url, index) => this.status('browse', `Reading ${url} (${index + 1}/${total})...`),
    });
    if (state.research.length === 0) {
      log.warn({ urls: state.urls }, 'all_pages_failed');
      return this.finish(state, BROWSE_FAILED_MESSAGE, 'browse-failed', false);
    }

    this.status('synthesize', 'Fact-checking and writing your summary...');
    state.summary = await synthesizeSummary(state.goal, state.research, this.stage);
    if (isErrorText(state.summary)) {
      log.warn('Summary generation failed; skipping the email step');
      return this.finish(state, state.summary, 'completed', false);
    }
    await this.present(state, state.summary);

    this.status('draft-email', 'Deciding whether to draft an email...');
    const decision = await draftEmail(state.goal, state.summary, state.research, this.stage);
    const emailSent = decision.sendEmail ? await this.confirmAndSend(decision, state.recipient) : false;
    return this.finish(state, state.summary, 'completed', emailSent);
  }

  /**
   * Resolves a recipient with the user and sends. The extracted address is
   * only reused after a yes; without one the user is asked whether to send
   * and then for an address. Refusal or a blank address sends nothing.
   */
  private async confirmAndSend(
    draft: Extract<EmailDecision, { sendEmail: true }>,
    extracted: string,
  ): Promise<boolean> {
    const { gate, mailer, log } = this.deps;
    this.status('confirm-send', 'Waiting for your confirmation...');
    await gate.notify(`I have drafted the following email for you:\n\nSubject: ${draft.subject}\n\n${draft.body}`);

    let recipient = NO_RECIPIENT;
    if (extracted !== NO_RECIPIENT) {
      const reply = await gate.ask(`Should I send this to the address you provided (${extracted})? (y/n): `);
      if (isAffirmative(reply)) recipient = extracted;
    } else {
      const reply = await gate.ask('Would you like me to email this summary to you? (y/n): ');
      if (isAffirmative(reply)) recipient = (await gate.ask('Please enter your email address: ')).trim();
    }

    if (!recipient || recipient === NO_RECIPIENT) {
      log.debug('User declined the email');
      await gate.notify('Okay, I will not send the email.');
      return false;
    }

    const result = await mailer.send({ to: recipient, subject: draft.subject, body: draft.body });
    await gate.notify(result);
    return !isErrorText(result);
  }

  private async present(state: TurnState, summary: string): Promise<void> {
    state.shown = summary;
    try {
      await this.deps.onSummary?.(summary);
    } catch (error) {
      this.deps.log.warn({ error: errorMessage(error) }, 'summary_display_failed');
    }
  }

  private finish(state: TurnState, summary: string, exit: TurnExit, emailSent: boolean): TurnResult {
    this.deps.log.debug({ exit, emailSent }, 'turn_complete');
    return { summary, exit, effectiveGoal: state.goal, query: state.query, emailSent };
  }

  private status(stage: PipelineStageKey, message: string): void {
    this.deps.onStatus?.({ stage, message });
  }
}
