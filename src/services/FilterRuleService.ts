/**
 * Admin write path for content filter rules.
 * Rules are validated here so the moderation path rarely meets a broken one.
 */

import type { IFilterRuleRepository } from '../repositories/IFilterRuleRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ContentFilterRow } from '../types/database.js';
import type { CreateFilterRuleRequest, FilterRuleResponse } from '../types/api.js';
import { FILTER_TYPES, SEVERITIES } from '../types/models.js';
import { ValidationError } from '../errors.js';
import { DEFAULT_REPLACEMENT, compileRule, rowToRule } from './ContentModerator.js';

export class FilterRuleService {
  constructor(
    private readonly ruleRepo: IFilterRuleRepository,
    private readonly logProvider: ILogProvider
  ) {}

  async createRule(input: CreateFilterRuleRequest): Promise<FilterRuleResponse> {
    const pattern = input.pattern.trim();
    if (pattern.length === 0) {
      throw new ValidationError('pattern must not be empty');
    }
    if (!FILTER_TYPES.includes(input.filterType)) {
      throw new ValidationError(`filterType must be one of: ${FILTER_TYPES.join(', ')}`);
    }
    if (!SEVERITIES.includes(input.severity)) {
      throw new ValidationError(`severity must be one of: ${SEVERITIES.join(', ')}`);
    }
    if (!compileRule({ filterType: input.filterType, pattern })) {
      throw new ValidationError('pattern is not a valid regular expression', { pattern });
    }

    const row = await this.ruleRepo.insert({
      filter_type: input.filterType,
      pattern,
      severity: input.severity,
      replacement: input.replacement ?? DEFAULT_REPLACEMENT,
      applies_to_input: input.appliesToInput ?? true,
      applies_to_output: input.appliesToOutput ?? true,
      applies_to_kb: input.appliesToKnowledgeBase ?? true,
      language: input.language ?? 'all',
      is_active: input.isActive ?? true,
    });

    this.logProvider.info('Filter rule created', {
      ruleId: row.id,
      filterType: row.filter_type,
      severity: row.severity,
    });

    return this.toResponse(row);
  }

  /** All rules, newest first. */
  async listRules(): Promise<FilterRuleResponse[]> {
    const rows = await this.ruleRepo.findAll();
    return rows.map((row) => this.toResponse(row));
  }

  private toResponse(row: ContentFilterRow): FilterRuleResponse {
    const rule = rowToRule(row);
    if (!rule) {
      throw new Error(`Filter rule ${row.id} has an unknown type or severity`);
    }

    return {
      id: rule.id,
      filterType: rule.filterType,
      pattern: rule.pattern,
      severity: rule.severity,
      replacement: rule.replacement,
      appliesToInput: rule.appliesToInput,
      appliesToOutput: rule.appliesToOutput,
      appliesToKnowledgeBase: rule.appliesToKnowledgeBase,
      language: rule.language,
      isActive: rule.isActive,
      createdAt: rule.createdAt.toISOString(),
      updatedAt: rule.updatedAt.toISOString(),
    };
  }
}
