/**
 * Rule-based content moderation for user input, AI output and FAQ answers.
 *
 * Rules are evaluated highest severity first (most recently updated first
 * within a tier) against the text as modified so far:
 *   high   → whole text replaced by BLOCK_NOTICE, evaluation stops
 *   medium → matched spans replaced by the rule's replacement
 *   low    → text untouched, action is `warned` unless something stronger applied
 *
 * Exactly one moderation event is written per call that matched anything,
 * pointing at the first matched rule. Rules that fail to compile or to match
 * are skipped individually.
 */

import type { IFilterRuleRepository } from '../repositories/IFilterRuleRepository.js';
import type { IModerationLogRepository } from '../repositories/IModerationLogRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ContentFilterRow } from '../types/database.js';
import type { ModerationResult } from '../types/api.js';
import {
  FILTER_TYPES,
  SEVERITIES,
  type ContentFilterRule,
  type ContentType,
  type FilterType,
  type ModerationAction,
  type Severity,
} from '../types/models.js';
import { detectLanguage } from '../moderation/language.js';

export const BLOCK_NOTICE =
  'Сообщение заблокировано системой модерации. / This message was blocked by content moderation.';

export const DEFAULT_REPLACEMENT = '***';

const SEVERITY_RANK: Record<Severity, number> = { low: 1, medium: 2, high: 3 };

/** Letters, digits and underscore count as "inside a word" for banned words. */
const WORD_CHAR = '[\\p{L}\\p{N}_]';

export interface FilterOptions {
  /** Language code, or `auto` (default) to detect from the text. */
  language?: string;
  sessionId?: string | null;
  clientAddress?: string | null;
}

interface CompiledRule {
  rule: ContentFilterRule;
  regex: RegExp;
}

export class ContentModerator {
  /** Rule ids already reported as invalid, so each is logged once. */
  private readonly reportedInvalid = new Set<string>();

  constructor(
    private readonly ruleRepo: IFilterRuleRepository,
    private readonly moderationLogRepo: IModerationLogRepository,
    private readonly logProvider: ILogProvider
  ) {}

  async filter(
    text: string,
    contentType: ContentType,
    options: FilterOptions = {}
  ): Promise<ModerationResult> {
    const language =
      !options.language || options.language === 'auto'
        ? detectLanguage(text)
        : options.language;

    if (text.trim().length === 0) {
      return unfiltered(text, language);
    }

    const rules = await this.loadRules(contentType, language);

    let current = text;
    let action: ModerationAction | null = null;
    let severity: Severity | null = null;
    const matchedRuleIds: string[] = [];

    for (const compiled of rules) {
      if (!this.matches(compiled, current)) continue;

      const { rule } = compiled;
      matchedRuleIds.push(rule.id);
      if (severity === null || SEVERITY_RANK[rule.severity] > SEVERITY_RANK[severity]) {
        severity = rule.severity;
      }

      if (rule.severity === 'high') {
        current = BLOCK_NOTICE;
        action = 'blocked';
        break;
      }

      if (rule.severity === 'medium') {
        current = current.replace(compiled.regex, () => rule.replacement);
        action = 'censored';
      } else if (action === null) {
        action = 'warned';
      }
    }

    if (action === null) {
      return unfiltered(text, language);
    }

    await this.recordEvent({
      originalText: text,
      modifiedText: current,
      action,
      matchedRuleId: matchedRuleIds[0] ?? null,
      contentType,
      sessionId: options.sessionId ?? null,
      clientAddress: options.clientAddress ?? null,
    });

    return {
      filteredText: current,
      isFiltered: true,
      action,
      matchedRuleIds,
      severity,
      language,
    };
  }

  // ── Private ──

  private async loadRules(contentType: ContentType, language: string): Promise<CompiledRule[]> {
    const rows = await this.ruleRepo.findActive(contentType, language);
    const compiled: CompiledRule[] = [];

    for (const row of rows) {
      const rule = rowToRule(row);
      const regex = rule ? compileRule(rule) : null;

      if (!rule || !regex) {
        this.reportInvalid(row);
        continue;
      }
      compiled.push({ rule, regex });
    }

    return compiled.sort(
      (a, b) =>
        SEVERITY_RANK[b.rule.severity] - SEVERITY_RANK[a.rule.severity] ||
        b.rule.updatedAt.getTime() - a.rule.updatedAt.getTime()
    );
  }

  private matches(compiled: CompiledRule, text: string): boolean {
    try {
      return text.search(compiled.regex) !== -1;
    } catch (err) {
      this.logProvider.warn('Filter rule failed to match, skipping', {
        ruleId: compiled.rule.id,
        error: err instanceof Error ? err.message : String(err),
      });
      return false;
    }
  }

  private reportInvalid(row: ContentFilterRow): void {
    if (this.reportedInvalid.has(row.id)) return;
    this.reportedInvalid.add(row.id);

    this.logProvider.warn('Skipping invalid filter rule', {
      ruleId: row.id,
      filterType: row.filter_type,
      pattern: row.pattern,
    });
  }

  /** Best-effort: a failed audit write never changes the moderation outcome. */
  private async recordEvent(event: {
    originalText: string;
    modifiedText: string;
    action: ModerationAction;
    matchedRuleId: string | null;
    contentType: ContentType;
    sessionId: string | null;
    clientAddress: string | null;
  }): Promise<void> {
    this.logProvider.info(`Content ${event.action}`, {
      contentType: event.contentType,
      ruleId: event.matchedRuleId,
      sessionId: event.sessionId,
    });

    try {
      await this.moderationLogRepo.insert({
        original_text: event.originalText,
        modified_text: event.modifiedText,
        action: event.action,
        matched_rule_id: event.matchedRuleId,
        content_type: event.contentType,
        session_id: event.sessionId,
        client_address: event.clientAddress,
      });
    } catch (err) {
      this.logProvider.error('Failed to write moderation event', {
        error: err instanceof Error ? err.message : String(err),
        action: event.action,
      });
    }
  }
}

function unfiltered(text: string, language: string): ModerationResult {
  return {
    filteredText: text,
    isFiltered: false,
    action: null,
    matchedRuleIds: [],
    severity: null,
    language,
  };
}

export function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

const WORD_BOUNDARY = `(?:(?<=${WORD_CHAR})(?!${WORD_CHAR})|(?<!${WORD_CHAR})(?=${WORD_CHAR}))`;
const NOT_WORD_BOUNDARY = `(?:(?<=${WORD_CHAR})(?=${WORD_CHAR})|(?<!${WORD_CHAR})(?!${WORD_CHAR}))`;

/** Shorthand escapes rewritten outside and inside character classes. */
const SHORTHAND: Record<string, [outside: string, inside: string | null]> = {
  w: [WORD_CHAR, '\\p{L}\\p{N}_'],
  W: ['[^\\p{L}\\p{N}_]', null],
  d: ['\\p{Nd}', '\\p{Nd}'],
  D: ['\\P{Nd}', '\\P{Nd}'],
  b: [WORD_BOUNDARY, null],
  B: [NOT_WORD_BOUNDARY, null],
};

/**
 * Regex `\w`, `\d` and `\b` only know ASCII, even in unicode mode.
 * Rewrites them in terms of letters and digits of any script so admin
 * patterns work on Cyrillic text.
 */
export function unicodeWordClasses(source: string): string {
  let out = '';
  let inClass = false;

  for (let i = 0; i < source.length; i++) {
    const ch = source[i];
    if (ch === '\\' && i + 1 < source.length) {
      const next = source[i + 1];
      const mapped = SHORTHAND[next]?.[inClass ? 1 : 0];
      out += mapped ?? ch + next;
      i++;
      continue;
    }
    if (ch === '[' && !inClass) inClass = true;
    else if (ch === ']' && inClass) inClass = false;
    out += ch;
  }
  return out;
}

/**
 * Build the matcher for a rule, or null when it cannot be compiled.
 * Matchers are global so medium rules replace every occurrence.
 */
export function compileRule(
  rule: Pick<ContentFilterRule, 'filterType' | 'pattern'>
): RegExp | null {
  if (rule.pattern.trim().length === 0) return null;

  try {
    switch (rule.filterType) {
      case 'banned_word':
        return new RegExp(
          `(?<!${WORD_CHAR})${escapeRegex(rule.pattern)}(?!${WORD_CHAR})`,
          'giu'
        );
      case 'phrase':
        return new RegExp(escapeRegex(rule.pattern), 'giu');
      case 'pattern':
        return new RegExp(unicodeWordClasses(rule.pattern), 'giu');
    }
  } catch {
    return null;
  }
}

function isFilterType(value: string): value is FilterType {
  return (FILTER_TYPES as readonly string[]).includes(value);
}

function isSeverity(value: string): value is Severity {
  return (SEVERITIES as readonly string[]).includes(value);
}

export function rowToRule(row: ContentFilterRow): ContentFilterRule | null {
  if (!isFilterType(row.filter_type) || !isSeverity(row.severity)) return null;

  return {
    id: row.id,
    filterType: row.filter_type,
    pattern: row.pattern,
    severity: row.severity,
    replacement: row.replacement || DEFAULT_REPLACEMENT,
    appliesToInput: row.applies_to_input,
    appliesToOutput: row.applies_to_output,
    appliesToKnowledgeBase: row.applies_to_kb,
    language: row.language,
    isActive: row.is_active,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}
