// FORMAT CLASSIFIER
//
// Infers the answer shape from the query text alone.
// Rules come from config/format-rules.json and are checked in file order;
// the first rule with a matching keyword wins, otherwise the default applies.
// Pure: same query, same decision.

import formatRules from '@/lib/config/format-rules.json';
import type { FormatDecision, FormatType, LengthClass, StructureStyle } from '@/lib/core/types';
import { keywordPattern } from '@/lib/utils/normalize';

const FORMAT_TYPES: readonly FormatType[] = [
  'brief_summary',
  'social_media',
  'blog_post',
  'newsletter',
  'outline',
  'protocol',
  'comprehensive_analysis',
  'report',
  'factual_answer',
  'general_answer',
];
const LENGTH_CLASSES: readonly LengthClass[] = ['brief', 'medium', 'long', 'comprehensive'];
const STRUCTURES: readonly StructureStyle[] = [
  'bullet_points',
  'single_paragraph',
  'paragraphs',
  'sections',
  'numbered_steps',
  'hierarchical',
];

export interface FormatProfile extends FormatDecision {
  /** Shape instruction placed in the synthesis prompt */
  instruction: string;
}

interface CompiledRule {
  profile: FormatProfile;
  patterns: RegExp[];
  anchored: boolean;
}

interface RawProfile {
  formatType: string;
  lengthClass: string;
  structure: string;
  temperature: number;
  maxOutputTokens: number;
  proseStyle: string;
  instruction: string;
}

function pick<T extends string>(allowed: readonly T[], value: string, field: string): T {
  const found = allowed.find((a) => a === value);
  if (!found) {
    throw new Error(`format-rules.json: unknown ${field} "${value}"`);
  }
  return found;
}

function toProfile(raw: RawProfile): FormatProfile {
  return {
    formatType: pick(FORMAT_TYPES, raw.formatType, 'formatType'),
    lengthClass: pick(LENGTH_CLASSES, raw.lengthClass, 'lengthClass'),
    structure: pick(STRUCTURES, raw.structure, 'structure'),
    temperature: raw.temperature,
    maxOutputTokens: raw.maxOutputTokens,
    proseStyle: raw.proseStyle,
    instruction: raw.instruction,
  };
}

const COMPILED_RULES: readonly CompiledRule[] = formatRules.rules.map((rule) => ({
  profile: toProfile(rule),
  patterns: rule.keywords.map(keywordPattern),
  anchored: rule.match === 'start',
}));

const DEFAULT_PROFILE: FormatProfile = toProfile(formatRules.default);

const MIN_CITATIONS: Record<LengthClass, number> = formatRules.minCitations;

function ruleMatches(rule: CompiledRule, query: string): boolean {
  return rule.patterns.some((pattern) => {
    const m = pattern.exec(query);
    return m !== null && (!rule.anchored || m.index === 0);
  });
}

/**
 * Full profile (decision plus prompt instruction) for a query.
 */
export function classifyFormatProfile(query: string): FormatProfile {
  const text = query.trim();
  const rule = COMPILED_RULES.find((r) => ruleMatches(r, text));
  return { ...(rule?.profile ?? DEFAULT_PROFILE) };
}

/**
 * Format decision for a query.
 *
 * @example classifyFormat("Write a tweet about AML").formatType => "social_media"
 */
export function classifyFormat(query: string): FormatDecision {
  const { instruction: _instruction, ...decision } = classifyFormatProfile(query);
  return decision;
}

/** Instruction text for a decision's format type. */
export function formatInstruction(formatType: FormatType): string {
  const rule = COMPILED_RULES.find((r) => r.profile.formatType === formatType);
  return (rule?.profile ?? DEFAULT_PROFILE).instruction;
}

export function minimumCitations(lengthClass: LengthClass): number {
  return MIN_CITATIONS[lengthClass];
}
