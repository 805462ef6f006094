/**
 * @module verifier/verifier
 * Replays pact interactions against a live provider.
 *
 * Lifecycle: configured -> executing -> success | failures.
 *
 * Sources run up to `concurrency` at a time; interactions within a source
 * run in order. Each interaction gets its provider states set up, is sent
 * to the provider (HTTP) or to the message handler, and the result is
 * compared with the expected response by the response matcher. Transport
 * faults are reported as `provider-connection`, never as mismatches.
 */

import { AccordError } from '../errors.js';
import { CHANNELS } from '../event-bus.js';
import { generateRequest } from '../generators/generator-engine.js';
import { bodyContentType, bodyFromBuffer, bodyToBuffer, headerValue } from '../models/body.js';
import { emptyResponse, queryToString } from '../models/pact.js';
import { matchMessage, matchResponse } from '../matching/request-matcher.js';
import { buildReport } from '../reporter.js';
import {
  isJsonObject,
  type Body,
  type Bus,
  type HttpInteraction,
  type HttpRequest,
  type HttpResponse,
  type Interaction,
  type JsonObject,
  type LogLevel,
  type MessageInteraction,
  type Mismatch,
  type MultiValueMap,
  type ProviderState,
  type Reporter,
  type VerificationEvent,
  type VerificationFailureKind,
  type VerificationReport,
} from '../types.js';
import { describeSource, loadSource, type LoadedPact, type PactSource } from './sources.js';

// =====================================================================
// Types
// =====================================================================

export type VerifierState = 'configured' | 'executing' | 'success' | 'failures';

export interface ProviderInfo {
  name: string;
  protocol?: 'http' | 'https';
  host?: string;
  port?: number;
  basePath?: string;
}

export interface InteractionFilter {
  /** Regular expression tested against interaction descriptions. */
  description?: string;
  /** Only interactions having a provider state with this name. */
  state?: string;
  /** Only interactions without provider states. */
  noState?: boolean;
}

/** What a message provider produced for an expected message. */
export interface ProducedMessage {
  contents: Body;
  metadata?: JsonObject;
}

export type MessageHandler = (message: MessageInteraction) => Promise<ProducedMessage>;

export interface VerifierOptions {
  provider: ProviderInfo;
  sources?: PactSource[];
  /** Provider and state-change request timeout in ms. */
  timeout?: number;
  /** Sources verified at once. */
  concurrency?: number;
  filter?: InteractionFilter;
  /** Receives `{ state, params, action }` before and after each interaction. */
  stateChangeUrl?: string;
  messageHandler?: MessageHandler;
  /** Succeed when the sources hold no pacts instead of failing the run. */
  ignoreNoPacts?: boolean;
  reporters?: Reporter[];
  bus?: Bus;
  random?: () => number;
}

export interface VerificationResult {
  success: boolean;
  report: VerificationReport;
}

class InteractionFailure extends Error {
  constructor(readonly kind: VerificationFailureKind, message: string, readonly mismatches: Mismatch[] = []) {
    super(message);
  }
}

const DEFAULT_TIMEOUT = 5000;

// =====================================================================
// Helpers
// =====================================================================

function hasState(interaction: Interaction, name: string): boolean {
  return interaction.providerStates.some((state) => state.name === name);
}

function headersToFetch(headers: MultiValueMap): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, values] of Object.entries(headers)) {
    result[key] = values.join(', ');
  }
  return result;
}

/** Raw header values; list headers are split by the header matcher. */
function headersFromFetch(headers: Headers): MultiValueMap {
  const result: MultiValueMap = {};
  headers.forEach((value, key) => {
    result[key] = [value];
  });
  return result;
}

async function fetchWithTimeout(url: string, init: RequestInit, timeout: number): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeout);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } catch (err) {
    const reason = controller.signal.aborted ? `timed out after ${timeout}ms` : (err as Error).message;
    throw new AccordError('PROVIDER_CONNECTION_ERROR', `Request to ${url} failed: ${reason}`, { url });
  } finally {
    clearTimeout(timer);
  }
}

function compileFilter(pattern: string | undefined): RegExp | undefined {
  if (!pattern) return undefined;
  try {
    return new RegExp(pattern);
  } catch (err) {
    throw new AccordError('CONFIGURATION_ERROR', `Description filter is not a valid regex: ${(err as Error).message}`, { pattern });
  }
}

// =====================================================================
// Verifier
// =====================================================================

export class Verifier {
  private currentState: VerifierState = 'configured';
  private readonly sources: PactSource[];
  private readonly events: VerificationEvent[] = [];
  private descriptionFilter: RegExp | undefined;
  private pactsLoaded = 0;

  constructor(private readonly options: VerifierOptions) {
    this.sources = [...(options.sources ?? [])];
  }

  get state(): VerifierState {
    return this.currentState;
  }

  addSource(source: PactSource): this {
    if (this.currentState !== 'configured') {
      throw new AccordError('CONFIGURATION_ERROR', 'Sources can not be added once verification has started');
    }
    this.sources.push(source);
    return this;
  }

  get providerUrl(): string {
    const { protocol = 'http', host = 'localhost', port, basePath = '' } = this.options.provider;
    return `${protocol}://${host}${port !== undefined ? `:${port}` : ''}${basePath.replace(/\/$/, '')}`;
  }

  /** Verify every source. Only non-pending failures fail the run. */
  async execute(): Promise<VerificationResult> {
    if (this.currentState !== 'configured') {
      throw new AccordError('CONFIGURATION_ERROR', `Verifier has already run (state '${this.currentState}')`);
    }
    this.descriptionFilter = compileFilter(this.options.filter?.description);
    this.currentState = 'executing';
    await this.verifySources();

    const noPacts = this.pactsLoaded === 0 && !this.options.ignoreNoPacts;
    if (noPacts) this.log('error', 'No pacts were found to verify');
    const report = buildReport(this.events, this.options.provider.name);
    const success = report.totals.failed === 0 && !noPacts;
    this.currentState = success ? 'success' : 'failures';
    return { success, report };
  }

  // ── Sources ─────────────────────────────────────────────────────────

  /** Up to `concurrency` workers take sources from a shared queue. */
  private async verifySources(): Promise<void> {
    const queue = [...this.sources];
    const workers = Math.min(Math.max(1, this.options.concurrency ?? 1), queue.length);
    await Promise.all(Array.from({ length: workers }, async () => {
      for (let source = queue.shift(); source; source = queue.shift()) {
        await this.verifySource(source);
      }
    }));
  }

  private async verifySource(source: PactSource): Promise<void> {
    const name = describeSource(source);
    let loaded: LoadedPact[];
    try {
      loaded = await loadSource(source, this.options.provider.name, this.options.timeout ?? DEFAULT_TIMEOUT);
    } catch (err) {
      this.emit({ type: 'source_start', source: name, consumer: '', provider: this.options.provider.name, timestamp: Date.now() });
      this.emit({
        type: 'interaction_fail', source: name, description: 'load pact', kind: 'internal',
        error: (err as Error).message, mismatches: [], duration: 0, pending: false, timestamp: Date.now(),
      });
      this.emit({ type: 'source_end', source: name, passed: 0, failed: 1, skipped: 0, duration: 0, timestamp: Date.now() });
      return;
    }
    for (const entry of loaded) {
      await this.verifyPact(entry);
    }
  }

  private async verifyPact({ name, pact }: LoadedPact): Promise<void> {
    const started = Date.now();
    this.pactsLoaded++;
    this.emit({ type: 'source_start', source: name, consumer: pact.consumer.name, provider: pact.provider.name, timestamp: started });
    if (pact.provider.name !== this.options.provider.name) {
      this.log('warn', `Pact ${name} is for provider '${pact.provider.name}', verifying as '${this.options.provider.name}'`);
    }
    let passed = 0;
    let failed = 0;
    let skipped = 0;
    for (const interaction of pact.interactions) {
      const skipReason = this.skipReason(interaction);
      if (skipReason) {
        skipped++;
        this.emit({ type: 'interaction_skip', source: name, description: interaction.description, reason: skipReason, timestamp: Date.now() });
        continue;
      }
      if (await this.verifyInteraction(name, interaction)) passed++;
      else if (!interaction.pending) failed++;
    }
    this.emit({ type: 'source_end', source: name, passed, failed, skipped, duration: Date.now() - started, timestamp: Date.now() });
  }

  private skipReason(interaction: Interaction): string | undefined {
    const filter = this.options.filter ?? {};
    if (this.descriptionFilter && !this.descriptionFilter.test(interaction.description)) {
      return `description does not match '${filter.description}'`;
    }
    if (filter.state && !hasState(interaction, filter.state)) {
      return `no provider state '${filter.state}'`;
    }
    if (filter.noState && interaction.providerStates.length > 0) {
      return 'interaction has provider states';
    }
    return undefined;
  }

  // ── Interactions ────────────────────────────────────────────────────

  private async verifyInteraction(source: string, interaction: Interaction): Promise<boolean> {
    const started = Date.now();
    try {
      const stateValues = await this.changeStates(interaction.providerStates, 'setup');
      try {
        const mismatches = interaction.type === 'Synchronous/HTTP'
          ? await this.verifyHttp(interaction, stateValues)
          : await this.verifyMessage(interaction);
        if (mismatches.length > 0) {
          throw new InteractionFailure('mismatch', `${mismatches.length} mismatch(es) with the expected response`, mismatches);
        }
      } finally {
        await this.changeStates(interaction.providerStates, 'teardown');
      }
      this.emit({
        type: 'interaction_pass', source, description: interaction.description,
        duration: Date.now() - started, pending: interaction.pending, timestamp: Date.now(),
      });
      return true;
    } catch (err) {
      const failure = this.toFailure(err);
      this.emit({
        type: 'interaction_fail', source, description: interaction.description, kind: failure.kind,
        error: failure.message, mismatches: failure.mismatches,
        duration: Date.now() - started, pending: interaction.pending, timestamp: Date.now(),
      });
      return false;
    }
  }

  private toFailure(err: unknown): InteractionFailure {
    if (err instanceof InteractionFailure) return err;
    if (err instanceof AccordError && err.code === 'PROVIDER_CONNECTION_ERROR') {
      return new InteractionFailure('provider-connection', err.message);
    }
    return new InteractionFailure('internal', (err as Error).message);
  }

  /**
   * POST each provider state to the state-change URL.
   *
   * @returns values returned by setup calls, merged, for ProviderState generators
   */
  private async changeStates(states: ProviderState[], action: 'setup' | 'teardown'): Promise<JsonObject> {
    const url = this.options.stateChangeUrl;
    const values: JsonObject = {};
    if (!url || states.length === 0) return values;
    for (const state of states) {
      let response: Response;
      try {
        response = await fetchWithTimeout(url, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ state: state.name, params: state.params, action }),
        }, this.options.timeout ?? DEFAULT_TIMEOUT);
      } catch (err) {
        throw new InteractionFailure('state-change', `Provider state ${action} for '${state.name}' failed: ${(err as Error).message}`);
      }
      if (!response.ok) {
        throw new InteractionFailure('state-change', `Provider state ${action} for '${state.name}' returned HTTP ${response.status}`);
      }
      const text = await response.text();
      if (action === 'setup' && text) {
        try {
          const parsed: unknown = JSON.parse(text);
          if (isJsonObject(parsed)) Object.assign(values, parsed);
        } catch {
          this.log('debug', `State change response for '${state.name}' is not JSON; ignored`);
        }
      }
    }
    return values;
  }

  private async verifyHttp(interaction: HttpInteraction, stateValues: JsonObject): Promise<Mismatch[]> {
    const request = generateRequest(interaction.request, {
      mode: 'provider',
      providerState: stateValues,
      random: this.options.random,
    });
    const actual = await this.send(request);
    return matchResponse(interaction.response, actual);
  }

  private async send(request: HttpRequest): Promise<HttpResponse> {
    const query = queryToString(request.query);
    const url = `${this.providerUrl}${request.path}${query ? `?${query}` : ''}`;
    const headers = headersToFetch(request.headers);
    const data = bodyToBuffer(request.body);
    const contentType = bodyContentType(request.body);
    if (data && contentType && headerValue(request.headers, 'content-type') === undefined) {
      headers['Content-Type'] = contentType;
    }
    this.log('debug', `Sending ${request.method} ${url}`);
    const response = await fetchWithTimeout(url, {
      method: request.method,
      headers,
      body: data ? new Uint8Array(data) : undefined,
    }, this.options.timeout ?? DEFAULT_TIMEOUT);
    const responseHeaders = headersFromFetch(response.headers);
    const buffer = Buffer.from(await response.arrayBuffer());
    return {
      ...emptyResponse(),
      status: response.status,
      headers: responseHeaders,
      body: bodyFromBuffer(buffer, headerValue(responseHeaders, 'content-type')),
    };
  }

  private async verifyMessage(message: MessageInteraction): Promise<Mismatch[]> {
    const handler = this.options.messageHandler;
    if (!handler) {
      throw new InteractionFailure('internal', `No message handler is configured to produce '${message.description}'`);
    }
    const produced = await handler(message);
    return matchMessage(message, produced.contents, produced.metadata ?? {});
  }

  // ── Events ──────────────────────────────────────────────────────────

  private emit(event: VerificationEvent): void {
    this.events.push(event);
    for (const reporter of this.options.reporters ?? []) {
      reporter.onEvent(event);
    }
    this.options.bus?.emit(CHANNELS.verifier, { event: event.type, data: event });
  }

  private log(level: LogLevel, message: string): void {
    this.emit({ type: 'log', level, message, timestamp: Date.now() });
  }
}
