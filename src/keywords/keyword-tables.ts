/**
 * Keyword table loader + matcher.
 *
 * Tables live in config/keyword-tables.yaml and are validated against a JSON
 * schema on load. A keyword made only of word characters matches at the start
 * of a word (`leak` matches "leaking", `hi` does not match "this"); any other
 * keyword (`thank you`, `!!!`) matches as a plain substring.
 */

import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import Ajv from 'ajv';
import { KeywordTables, KeywordListName, NamedKeywords, GENERAL_TOPIC } from './types';
import { logger } from '../observability/logger';

const DEFAULT_TABLES_PATH = path.resolve(__dirname, '..', '..', 'config', 'keyword-tables.yaml');

const keywordList = { type: 'array', items: { type: 'string', minLength: 1 } };

const namedList = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      name: { type: 'string', minLength: 1 },
      keywords: keywordList,
    },
    required: ['name', 'keywords'],
    additionalProperties: false,
  },
};

const schema = {
  type: 'object',
  properties: {
    version: { type: 'integer', minimum: 1 },
    topics: namedList,
    serviceTypes: namedList,
    serviceRequest: keywordList,
    satisfaction: keywordList,
    dissatisfaction: keywordList,
    resolution: keywordList,
    escalation: keywordList,
    formalStyle: keywordList,
    casualStyle: keywordList,
    politeness: keywordList,
    urgency: keywordList,
    detail: keywordList,
    tech: keywordList,
    moodPositive: keywordList,
    moodNegative: keywordList,
    urgentIndicators: keywordList,
  },
  required: [
    'version', 'topics', 'serviceTypes', 'serviceRequest', 'satisfaction', 'dissatisfaction',
    'resolution', 'escalation', 'formalStyle', 'casualStyle', 'politeness', 'urgency',
    'detail', 'tech', 'moodPositive', 'moodNegative', 'urgentIndicators',
  ],
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validateTables = ajv.compile<KeywordTables>(schema);

/**
 * Load and validate the keyword tables.
 * Throws when the file is missing or invalid: running with a partial
 * taxonomy would silently skew every score.
 */
export function loadKeywordTables(filePath?: string): KeywordTables {
  const resolved = filePath || DEFAULT_TABLES_PATH;
  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(resolved, 'utf-8'));
  } catch (err) {
    logger.error({ err, filePath: resolved }, 'Failed to read keyword tables');
    throw new Error(`Cannot read keyword tables at ${resolved}`, { cause: err });
  }

  if (!validateTables(parsed)) {
    const errors = validateTables.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
    logger.error({ filePath: resolved, errors }, 'Keyword tables failed validation');
    throw new Error(`Invalid keyword tables at ${resolved}: ${errors}`);
  }

  logger.info({ filePath: resolved, version: parsed.version, topics: parsed.topics.length }, 'Keyword tables loaded');
  return parsed;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class KeywordMatcher {
  private readonly compiled = new Map<string, (text: string) => boolean>();

  constructor(readonly tables: KeywordTables) {}

  /** True when any keyword of the list occurs in the text */
  matchesAny(text: string, list: KeywordListName | string[]): boolean {
    const lower = text.toLowerCase();
    return this.resolveList(list).some((keyword) => this.matcherFor(keyword)(lower));
  }

  /** First topic (table order) whose keywords match, else `general` */
  detectTopic(text: string): string {
    return this.firstNamedMatch(text, this.tables.topics) ?? GENERAL_TOPIC;
  }

  /** Service category, else `general` */
  classifyServiceType(text: string): string {
    return this.firstNamedMatch(text, this.tables.serviceTypes) ?? GENERAL_TOPIC;
  }

  private firstNamedMatch(text: string, groups: NamedKeywords[]): string | undefined {
    const lower = text.toLowerCase();
    for (const group of groups) {
      if (group.keywords.some((keyword) => this.matcherFor(keyword)(lower))) {
        return group.name;
      }
    }
    return undefined;
  }

  private resolveList(list: KeywordListName | string[]): string[] {
    return Array.isArray(list) ? list : this.tables[list];
  }

  private matcherFor(keyword: string): (text: string) => boolean {
    let matcher = this.compiled.get(keyword);
    if (!matcher) {
      const normalized = keyword.toLowerCase();
      if (/^\w+$/.test(normalized)) {
        const pattern = new RegExp(`\\b${escapeRegExp(normalized)}`);
        matcher = (text) => pattern.test(text);
      } else {
        matcher = (text) => text.includes(normalized);
      }
      this.compiled.set(keyword, matcher);
    }
    return matcher;
  }
}
