import type { Logger } from '../core/logging/logger.js';
import { createConsoleLogger } from '../core/logging/logger.js';
import type { QueryLogEntry } from '../orm/query-logger.js';
import type { StatementEvents, Unsubscribe } from '../orm/statement-events.js';

export type StatementKind = 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE' | 'UNKNOWN';

const KINDS: readonly StatementKind[] = ['SELECT', 'INSERT', 'UPDATE', 'DELETE', 'UNKNOWN'];

export interface CapturedStatement {
  /** Trimmed, whitespace-collapsed SQL text. */
  statement: string;
  kind: StatementKind;
  parameters: readonly unknown[];
  /** 0-based position within the capture. */
  index: number;
}

export interface RepeatedPattern {
  /** SELECT text with numeric literals replaced by `?`. */
  pattern: string;
  indices: number[];
}

export interface AnalysisResult {
  totalCount: number;
  selectCount: number;
  countsByKind: Record<StatementKind, number>;
  potentialNPlusOne: boolean;
  repeatedPatterns: RepeatedPattern[];
}

/** Anything exposing a statement hub, i.e. either engine. */
export interface StatementSource {
  readonly events: StatementEvents;
  /** Configured threshold of the source, used when none is passed. */
  readonly nPlusOneThreshold?: number;
}

export interface QueryAnalyzerOptions {
  /** SELECT count that must be exceeded before repeats count as N+1. Defaults to the source's, then 2. */
  threshold?: number;
  /** Destination of `printReport`. */
  logger?: Logger;
}

export interface CaptureHandle {
  readonly label: string | undefined;
  /** Stops recording. Idempotent; a handle superseded by a newer capture does nothing. */
  end(): void;
}

const NUMERIC_LITERAL = /\b\d+(\.\d+)?\b/g;
const REPORT_RULE = '='.repeat(70);
const VERBOSE_RULE = '-'.repeat(70);

export const normalizeStatement = (sql: string): string => sql.trim().replace(/\s+/g, ' ');

export const classifyStatement = (normalized: string): StatementKind => {
  const keyword = /^\w+/.exec(normalized)?.[0].toUpperCase();
  return KINDS.find(kind => kind === keyword && kind !== 'UNKNOWN') ?? 'UNKNOWN';
};

export const statementPattern = (normalized: string): string => normalized.replace(NUMERIC_LITERAL, '?');

const truncate = (text: string, max: number): string => (text.length > max ? `${text.slice(0, max)}...` : text);

/**
 * Records the statements an engine executes during a capture window and
 * looks for the N+1 shape: the same SELECT issued again and again with
 * only literal values changing.
 *
 * @example
 * const analyzer = new QueryAnalyzer(engine);
 * await analyzer.captureAsync(() => loadAuthorsWithBooks(db));
 * if (analyzer.analyze().potentialNPlusOne) analyzer.printReport();
 */
export class QueryAnalyzer {
  readonly threshold: number;

  private readonly source: StatementSource;
  private readonly logger: Logger;
  private buffer: CapturedStatement[] = [];
  private unsubscribe: Unsubscribe | null = null;
  private generation = 0;
  private label: string | undefined;

  constructor(source: StatementSource, opts: QueryAnalyzerOptions = {}) {
    this.source = source;
    this.threshold = opts.threshold ?? source.nPlusOneThreshold ?? 2;
    this.logger = opts.logger ?? createConsoleLogger({ prefix: '[query-analyzer]' });
  }

  get isCapturing(): boolean {
    return this.unsubscribe !== null;
  }

  /** Captured statements, in execution order. */
  get statements(): readonly CapturedStatement[] {
    return this.buffer;
  }

  /**
   * Starts a new capture, discarding the previous one. A capture still
   * open is ended first.
   */
  beginCapture(label?: string): CaptureHandle {
    this.stop();
    this.buffer = [];
    this.label = label;
    const generation = ++this.generation;

    this.unsubscribe = this.source.events.on(entry => this.record(entry));

    return {
      label,
      end: () => {
        if (generation === this.generation) {
          this.stop();
        }
      },
    };
  }

  capture<T>(fn: () => T, label?: string): T {
    const handle = this.beginCapture(label);
    try {
      return fn();
    } finally {
      handle.end();
    }
  }

  async captureAsync<T>(fn: () => Promise<T>, label?: string): Promise<T> {
    const handle = this.beginCapture(label);
    try {
      return await fn();
    } finally {
      handle.end();
    }
  }

  /** Statement counts per kind; kinds never seen are 0. */
  stats(): Record<StatementKind, number> {
    const counts: Record<StatementKind, number> = { SELECT: 0, INSERT: 0, UPDATE: 0, DELETE: 0, UNKNOWN: 0 };
    for (const { kind } of this.buffer) {
      counts[kind]++;
    }
    return counts;
  }

  analyze(): AnalysisResult {
    const countsByKind = this.stats();

    const byPattern = new Map<string, number[]>();
    for (const { statement, kind, index } of this.buffer) {
      if (kind !== 'SELECT') continue;
      const pattern = statementPattern(statement);
      const indices = byPattern.get(pattern);
      if (indices) {
        indices.push(index);
      } else {
        byPattern.set(pattern, [index]);
      }
    }

    const repeatedPatterns: RepeatedPattern[] = [];
    for (const [pattern, indices] of byPattern) {
      if (indices.length > 1) {
        repeatedPatterns.push({ pattern, indices });
      }
    }

    return {
      totalCount: this.buffer.length,
      selectCount: countsByKind.SELECT,
      countsByKind,
      potentialNPlusOne: repeatedPatterns.length > 0 && countsByKind.SELECT > this.threshold,
      repeatedPatterns,
    };
  }

  /**
   * Human-readable report. Shows up to three repeated patterns; `verbose`
   * lists every captured statement as well.
   */
  formatReport(opts: { verbose?: boolean } = {}): string {
    const analysis = this.analyze();
    const lines: string[] = ['', REPORT_RULE, 'Query Analysis Report', REPORT_RULE];

    if (this.label !== undefined) {
      lines.push('', `Capture: ${this.label}`);
    }

    lines.push('', `Total Queries: ${analysis.totalCount}`, '', 'Query Type Breakdown:');
    for (const kind of [...KINDS].sort()) {
      const count = analysis.countsByKind[kind];
      if (count > 0) {
        lines.push(`  ${kind}: ${count}`);
      }
    }

    if (analysis.potentialNPlusOne) {
      lines.push('', 'Potential N+1 problem detected!');
      lines.push(`   Found ${analysis.repeatedPatterns.length} repeated query patterns`);
      lines.push('', 'Repeated Query Patterns:');
      for (const { pattern, indices } of analysis.repeatedPatterns.slice(0, 3)) {
        lines.push('', `  Pattern (repeated ${indices.length} times):`, `    ${truncate(pattern, 100)}`);
      }
    } else {
      lines.push('', 'No obvious N+1 problems detected');
    }

    if (opts.verbose && this.buffer.length > 0) {
      lines.push('', VERBOSE_RULE, 'All Captured Queries:', VERBOSE_RULE);
      for (const { statement, kind, index } of this.buffer) {
        lines.push('', `${index + 1}. [${kind}]`, `   ${statement.slice(0, 200)}`);
        if (statement.length > 200) {
          lines.push('   ...');
        }
      }
    }

    lines.push('', REPORT_RULE, '');
    return lines.join('\n');
  }

  printReport(opts: { verbose?: boolean } = {}): void {
    this.logger.info(this.formatReport(opts));
  }

  private record(entry: QueryLogEntry): void {
    const statement = normalizeStatement(entry.sql);
    this.buffer.push({
      statement,
      kind: classifyStatement(statement),
      parameters: [...entry.params],
      index: this.buffer.length,
    });
  }

  private stop(): void {
    if (!this.unsubscribe) return;
    const unsubscribe = this.unsubscribe;
    this.unsubscribe = null;
    unsubscribe();
  }
}
