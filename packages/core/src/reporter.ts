/**
 * @module reporter
 * Verification result reporters for accord.
 *
 * Provides two built-in {@link Reporter} implementations:
 * - {@link ConsoleReporter} streams coloured output to stdout
 * - {@link JSONReporter} collects events and generates a JSON report
 *
 * Sources may be verified concurrently, so events of different sources
 * interleave; reports are grouped by source name.
 */

import type { InteractionReport, Mismatch, Reporter, SourceReport, VerificationEvent, VerificationReport } from './types.js';

// =====================================================================
// ANSI helpers (no external dependency)
// =====================================================================

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const GRAY = '\x1b[90m';

/** One human-readable line per mismatch. */
export function formatMismatch(mismatch: Mismatch): string {
  switch (mismatch.type) {
    case 'BodyMismatch':
      return `body ${mismatch.path}: ${mismatch.mismatch}`;
    case 'HeaderMismatch':
      return `header ${mismatch.key}: ${mismatch.mismatch}`;
    case 'QueryMismatch':
      return `query ${mismatch.parameter}: ${mismatch.mismatch}`;
    case 'MetadataMismatch':
      return `metadata ${mismatch.key}: ${mismatch.mismatch}`;
    case 'StatusMismatch':
      return `status: ${mismatch.mismatch}`;
    case 'MethodMismatch':
    case 'PathMismatch':
    case 'BodyTypeMismatch':
      return mismatch.mismatch;
  }
}

// =====================================================================
// Console Reporter
// =====================================================================

/**
 * Reporter that streams coloured verification results to stdout.
 */
export class ConsoleReporter implements Reporter {
  id = 'console';
  private events: VerificationEvent[] = [];

  onEvent(event: VerificationEvent): void {
    this.events.push(event);

    switch (event.type) {
      case 'source_start':
        console.log(`\n${BOLD}Verifying a pact between ${event.consumer} and ${event.provider}${RESET} ${GRAY}(${event.source})${RESET}`);
        break;
      case 'interaction_pass':
        console.log(`  ${GREEN}✓${RESET} ${event.description} ${GRAY}(${event.duration}ms)${RESET}`);
        break;
      case 'interaction_fail': {
        const pending = event.pending ? ` ${YELLOW}[pending]${RESET}` : '';
        console.log(`  ${RED}✗${RESET} ${event.description}${pending} ${GRAY}(${event.duration}ms)${RESET}`);
        console.log(`    ${RED}[${event.kind}] ${event.error}${RESET}`);
        for (const mismatch of event.mismatches) {
          console.log(`      ${GRAY}-${RESET} ${formatMismatch(mismatch)}`);
        }
        break;
      }
      case 'interaction_skip':
        console.log(`  ${YELLOW}○${RESET} ${event.description} ${GRAY}(${event.reason})${RESET}`);
        break;
      case 'source_end':
        console.log(
          `\n  ${GREEN}${event.passed} passed${RESET}` +
            (event.failed > 0 ? `, ${RED}${event.failed} failed${RESET}` : '') +
            (event.skipped > 0 ? `, ${YELLOW}${event.skipped} skipped${RESET}` : '') +
            ` ${GRAY}(${event.duration}ms)${RESET}`,
        );
        break;
      case 'log': {
        const colour = event.level === 'error' ? RED : event.level === 'warn' ? YELLOW : GRAY;
        console.log(`  ${colour}[${event.level}]${RESET} ${event.message}`);
        break;
      }
    }
  }

  generate(): VerificationReport {
    return buildReport(this.events);
  }
}

// =====================================================================
// JSON Reporter
// =====================================================================

/**
 * Reporter that collects events silently and produces a JSON-friendly
 * {@link VerificationReport} via `generate()`.
 */
export class JSONReporter implements Reporter {
  id = 'json';
  private events: VerificationEvent[] = [];

  onEvent(event: VerificationEvent): void {
    this.events.push(event);
  }

  generate(): VerificationReport {
    return buildReport(this.events);
  }
}

// =====================================================================
// Report builder
// =====================================================================

function emptySource(source: string): SourceReport {
  return { source, passed: 0, failed: 0, skipped: 0, duration: 0, interactions: [] };
}

/**
 * Fold an event stream into a report. Sources are sorted by name and
 * interactions by description for stable output.
 */
export function buildReport(events: VerificationEvent[], provider = ''): VerificationReport {
  const sources = new Map<string, SourceReport>();
  let firstTs = Infinity;
  let lastTs = 0;
  let pendingFailures = 0;

  const sourceFor = (name: string): SourceReport => {
    let report = sources.get(name);
    if (!report) {
      report = emptySource(name);
      sources.set(name, report);
    }
    return report;
  };

  for (const event of events) {
    if (event.timestamp < firstTs) firstTs = event.timestamp;
    if (event.timestamp > lastTs) lastTs = event.timestamp;

    switch (event.type) {
      case 'source_start':
        sourceFor(event.source);
        if (!provider) provider = event.provider;
        break;
      case 'interaction_pass': {
        const report = sourceFor(event.source);
        report.passed++;
        report.interactions.push({ description: event.description, status: 'passed', pending: event.pending, duration: event.duration });
        break;
      }
      case 'interaction_fail': {
        const report = sourceFor(event.source);
        const entry: InteractionReport = {
          description: event.description,
          status: 'failed',
          pending: event.pending,
          duration: event.duration,
          kind: event.kind,
          error: event.error,
          mismatches: event.mismatches,
        };
        if (event.pending) pendingFailures++;
        else report.failed++;
        report.interactions.push(entry);
        break;
      }
      case 'interaction_skip': {
        const report = sourceFor(event.source);
        report.skipped++;
        report.interactions.push({ description: event.description, status: 'skipped', pending: false, duration: 0 });
        break;
      }
      case 'source_end':
        sourceFor(event.source).duration = event.duration;
        break;
      case 'log':
        break;
    }
  }

  const sorted = [...sources.values()].sort((a, b) => a.source.localeCompare(b.source));
  for (const report of sorted) {
    report.interactions.sort((a, b) => a.description.localeCompare(b.description));
  }

  return {
    provider,
    timestamp: firstTs === Infinity ? Date.now() : firstTs,
    duration: lastTs > firstTs ? lastTs - firstTs : 0,
    sources: sorted,
    totals: {
      passed: sorted.reduce((sum, s) => sum + s.passed, 0),
      failed: sorted.reduce((sum, s) => sum + s.failed, 0),
      skipped: sorted.reduce((sum, s) => sum + s.skipped, 0),
      pendingFailures,
    },
  };
}
