import { Logger } from '@nestjs/common';
import { Platform, SqlSecurityPolicy } from '../common/types';
import type { Value } from '../value/value';
import catalogue from './injection-patterns.json';

export enum Severity {
  Low = 'Low',
  Medium = 'Medium',
  High = 'High',
  Critical = 'Critical',
}

export enum Verdict {
  Allow = 'Allow',
  Warn = 'Warn',
  Deny = 'Deny',
}

const SEVERITY_RANK: Record<Severity, number> = {
  [Severity.Low]: 1,
  [Severity.Medium]: 2,
  [Severity.High]: 3,
  [Severity.Critical]: 4,
};

export interface DetectionResult {
  isDangerous: boolean;
  /** Highest severity among the findings; Low when nothing was found */
  severity: Severity;
  reasons: string[];
  /** Short names of the rules that fired */
  patterns: string[];
}

export interface DetectorOptions {
  maxQueryLength?: number;
  maxParameters?: number;
  /**
   * Backend the statement is written for
   * MySQL adds `#` comments and backslash escapes inside literals
   */
  platform?: Platform;
}

interface CataloguePattern {
  name: string;
  regex: RegExp;
  severity: Severity;
  description: string;
}

interface Finding {
  severity: Severity;
  reason: string;
  pattern: string;
}

interface MaskedSql {
  sql: string;
  comments: string[];
  unterminated: boolean;
}

const TRUSTED_TOKEN = '__trusted__';
const LITERAL = String.raw`'s\d+'|-?\d+(?:\.\d+)?`;
const LITERAL_PREDICATE = new RegExp(
  String.raw`\b(OR|AND)\s+(?:NOT\s+)?\(?\s*(${LITERAL})\s*(=|<>|!=|<=|>=|<|>|LIKE)\s*(${LITERAL})`,
  'gi',
);
const BOOLEAN_PREDICATE = /\b(OR|AND)\s+(TRUE|NOT\s+FALSE)\b/gi;
const SELECT_OR_UNION = /\b(SELECT|UNION)\b/gi;

function isSeverity(value: string): value is Severity {
  return Object.prototype.hasOwnProperty.call(SEVERITY_RANK, value);
}

function loadCatalogue(): CataloguePattern[] {
  return catalogue.map(entry => {
    if (!isSeverity(entry.severity)) {
      throw new Error(`Unknown severity '${entry.severity}' for injection pattern '${entry.name}'`);
    }
    return {
      name: entry.name,
      regex: new RegExp(entry.pattern, 'i'),
      severity: entry.severity,
      description: entry.description,
    };
  });
}

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && /\w/.test(ch);
}

function keywordAt(sql: string, index: number, keyword: string): boolean {
  return !isWordChar(sql[index - 1])
    && sql.slice(index, index + keyword.length).toUpperCase() === keyword
    && !isWordChar(sql[index + keyword.length]);
}

/**
 * Heuristic scanner run over the final SQL of every statement
 */
export class SqlInjectionDetector {
  private readonly logger = new Logger(SqlInjectionDetector.name);
  private readonly patterns = loadCatalogue();
  private readonly maxQueryLength: number;
  private readonly maxParameters: number;
  private readonly platform?: Platform;

  constructor(options: DetectorOptions = {}) {
    this.maxQueryLength = options.maxQueryLength ?? 65536;
    this.maxParameters = options.maxParameters ?? 65535;
    this.platform = options.platform;
  }

  /**
   * Inspect a statement; `trusted` expressions are masked first
   */
  scan(sql: string, params: readonly Value[] = [], trusted: readonly string[] = []): DetectionResult {
    const findings: Finding[] = [];
    const masked = this.mask(maskTrusted(sql, trusted));

    if (masked.unterminated) {
      findings.push({ severity: Severity.High, reason: 'Unterminated string literal', pattern: 'unterminated_literal' });
    }
    for (const comment of new Set(masked.comments)) {
      findings.push({ severity: Severity.High, reason: `Comment sequence '${comment}' outside a literal`, pattern: 'comment' });
    }
    if (masked.sql.replace(/;\s*$/, '').includes(';')) {
      findings.push({ severity: Severity.Critical, reason: 'Stacked statements', pattern: 'stacked_statements' });
    }
    const union = unionMismatch(masked.sql);
    if (union) {
      findings.push({
        severity: Severity.Critical,
        reason: `UNION selects ${union.right} columns against ${union.left} in the base query`,
        pattern: 'union_mismatch',
      });
    }
    findings.push(...literalPredicates(masked.sql));
    for (const pattern of this.patterns) {
      if (pattern.regex.test(masked.sql)) {
        findings.push({ severity: pattern.severity, reason: pattern.description, pattern: pattern.name });
      }
    }
    if (sql.length > this.maxQueryLength) {
      findings.push({
        severity: Severity.Medium,
        reason: `Query is too long: ${sql.length} characters, limit ${this.maxQueryLength}`,
        pattern: 'query_length',
      });
    }
    if (params.length > this.maxParameters) {
      findings.push({
        severity: Severity.Medium,
        reason: `Too many parameters: ${params.length}, limit ${this.maxParameters}`,
        pattern: 'parameter_count',
      });
    }

    return toResult(findings);
  }

  /**
   * Map a result onto the configured policy
   */
  verdict(result: DetectionResult, policy: SqlSecurityPolicy): Verdict {
    if (policy === SqlSecurityPolicy.Off || !result.isDangerous) {
      return Verdict.Allow;
    }
    if (policy === SqlSecurityPolicy.Warn) {
      return Verdict.Warn;
    }
    return SEVERITY_RANK[result.severity] >= SEVERITY_RANK[Severity.High] ? Verdict.Deny : Verdict.Warn;
  }

  /**
   * Scan and decide in one step; `Off` skips the scan entirely
   */
  inspect(
    sql: string,
    params: readonly Value[],
    trusted: readonly string[],
    policy: SqlSecurityPolicy,
  ): { result?: DetectionResult; verdict: Verdict } {
    if (policy === SqlSecurityPolicy.Off) {
      return { verdict: Verdict.Allow };
    }
    const result = this.scan(sql, params, trusted);
    const verdict = this.verdict(result, policy);
    if (verdict !== Verdict.Allow) {
      this.logger.debug(`${verdict} [${result.severity}] ${result.patterns.join(', ')}`);
    }
    return { result, verdict };
  }

  /**
   * Replace literal contents with stable tokens, drop comments and record them
   * Equal literals share a token so `'a'='a'` stays recognizable
   */
  private mask(sql: string): MaskedSql {
    const mysql = this.platform === Platform.MySQL;
    const tokens = new Map<string, number>();
    const comments: string[] = [];
    let out = '';
    let i = 0;

    while (i < sql.length) {
      const ch = sql[i];
      const next = sql[i + 1];

      if (ch === "'") {
        let content = '';
        let j = i + 1;
        let closed = false;
        while (j < sql.length) {
          if (mysql && sql[j] === '\\' && j + 1 < sql.length) {
            content += sql.slice(j, j + 2);
            j += 2;
            continue;
          }
          if (sql[j] === "'") {
            if (sql[j + 1] === "'") {
              content += "''";
              j += 2;
              continue;
            }
            closed = true;
            break;
          }
          content += sql[j];
          j += 1;
        }
        if (!closed) {
          return { sql: out, comments, unterminated: true };
        }
        let token = tokens.get(content);
        if (token === undefined) {
          token = tokens.size;
          tokens.set(content, token);
        }
        out += `'s${token}'`;
        i = j + 1;
        continue;
      }

      if (ch === '"' || ch === '`') {
        const end = sql.indexOf(ch, i + 1);
        if (end < 0) {
          return { sql: out, comments, unterminated: true };
        }
        out += `${ch}i${ch}`;
        i = end + 1;
        continue;
      }

      if (ch === '-' && next === '-') {
        comments.push('--');
        const end = sql.indexOf('\n', i);
        out += ' ';
        i = end < 0 ? sql.length : end;
        continue;
      }

      if (ch === '/' && next === '*') {
        comments.push('/*');
        const end = sql.indexOf('*/', i + 2);
        out += ' ';
        i = end < 0 ? sql.length : end + 2;
        continue;
      }

      if (mysql && ch === '#') {
        comments.push('#');
        const end = sql.indexOf('\n', i);
        out += ' ';
        i = end < 0 ? sql.length : end;
        continue;
      }

      out += ch;
      i += 1;
    }

    return { sql: out, comments, unterminated: false };
  }
}

/**
 * Replace each trusted expression, in order of appearance, with a neutral identifier
 */
function maskTrusted(sql: string, trusted: readonly string[]): string {
  let result = sql;
  let cursor = 0;
  for (const fragment of trusted) {
    if (!fragment) {
      continue;
    }
    const index = result.indexOf(fragment, cursor);
    if (index < 0) {
      continue;
    }
    result = result.slice(0, index) + TRUSTED_TOKEN + result.slice(index + fragment.length);
    cursor = index + TRUSTED_TOKEN.length;
  }
  return result;
}

function literalPredicates(sql: string): Finding[] {
  const findings: Finding[] = [];
  for (const match of sql.matchAll(LITERAL_PREDICATE)) {
    findings.push({
      severity: Severity.High,
      reason: `Literal comparison after ${match[1].toUpperCase()}: ${match[2]} ${match[3]} ${match[4]}`,
      pattern: 'literal_predicate',
    });
  }
  for (const match of sql.matchAll(BOOLEAN_PREDICATE)) {
    findings.push({
      severity: Severity.High,
      reason: `Constant predicate after ${match[1].toUpperCase()}: ${match[2].toUpperCase()}`,
      pattern: 'literal_predicate',
    });
  }
  return findings;
}

function depthMap(sql: string): number[] {
  const depths: number[] = [];
  let depth = 0;
  for (let i = 0; i < sql.length; i += 1) {
    const ch = sql[i];
    if (ch === ')') {
      depth -= 1;
    }
    depths.push(depth);
    if (ch === '(') {
      depth += 1;
    }
  }
  return depths;
}

/**
 * Number of projected columns after the SELECT keyword at `index`, or undefined for `*`
 */
function projectionWidth(sql: string, index: number): number | undefined {
  let depth = 0;
  let commas = 0;
  let i = index + 'SELECT'.length;
  const start = i;
  for (; i < sql.length; i += 1) {
    const ch = sql[i];
    if (ch === '(') {
      depth += 1;
    } else if (ch === ')') {
      depth -= 1;
      if (depth < 0) {
        break;
      }
    } else if (depth === 0) {
      if (ch === ',') {
        commas += 1;
      } else if (ch === ';' || keywordAt(sql, i, 'FROM') || keywordAt(sql, i, 'UNION')) {
        break;
      }
    }
  }
  const projection = sql.slice(start, i);
  return /(^|[\s,.])\*/.test(projection) ? undefined : commas + 1;
}

function unionMismatch(sql: string): { left: number; right: number } | undefined {
  const depths = depthMap(sql);
  const selects: number[] = [];
  for (const match of sql.matchAll(SELECT_OR_UNION)) {
    const index = match.index ?? 0;
    if (match[1].toUpperCase() === 'SELECT') {
      selects.push(index);
      continue;
    }
    const depth = depths[index];
    let base: number | undefined;
    for (let s = selects.length - 1; s >= 0; s -= 1) {
      const candidate = selects[s];
      if (depths.slice(candidate, index).some(d => d < depth)) {
        break;
      }
      if (base === undefined || depths[candidate] < depths[base]) {
        base = candidate;
      }
      if (depths[candidate] === depth) {
        break;
      }
    }
    const following = sql.slice(index).search(/\bSELECT\b/i);
    if (base === undefined || following < 0) {
      continue;
    }
    const left = projectionWidth(sql, base);
    const right = projectionWidth(sql, index + following);
    if (left !== undefined && right !== undefined && left !== right) {
      return { left, right };
    }
  }
  return undefined;
}

function toResult(findings: Finding[]): DetectionResult {
  if (findings.length === 0) {
    return { isDangerous: false, severity: Severity.Low, reasons: [], patterns: [] };
  }
  const severity = findings.reduce<Severity>(
    (highest, finding) => (SEVERITY_RANK[finding.severity] > SEVERITY_RANK[highest] ? finding.severity : highest),
    Severity.Low,
  );
  return {
    isDangerous: true,
    severity,
    reasons: findings.map(finding => finding.reason),
    patterns: [...new Set(findings.map(finding => finding.pattern))],
  };
}
