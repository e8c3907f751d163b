import { parseIsoDate } from '../profiles/profile.js';
import type { IsoDate, Profile } from '../profiles/profile.js';
import type { CertificateConfig } from '../profiles/snapshot.js';

const SERIF = 'font="Times New Roman"';

export const LAYOUT_FIELDS = [
  'headshot',
  'name',
  'birthday',
  'baptism_day',
  'baptism_month',
  'baptism_year',
  'sign_date',
] as const;

export type LayoutField = (typeof LAYOUT_FIELDS)[number];

export const DEFAULT_LAYOUT: Record<LayoutField, string> = {
  headshot: 'left=5 top=1 w=3',
  name: 'left=1 top=1 w=6 h=1.5 fontsz=18',
  birthday: `left=1 top=2.5 w=6 h=1.5 fontsz=18 ${SERIF}`,
  baptism_day: `left=1 top=4 w=6 h=1.5 fontsz=18 ${SERIF}`,
  baptism_month: `left=2 top=4 w=6 h=1.5 fontsz=18 ${SERIF}`,
  baptism_year: `left=3 top=4 w=6 h=1.5 fontsz=18 ${SERIF}`,
  sign_date: `left=1 top=5.5 w=6 h=1.5 fontsz=18 ${SERIF}`,
};

/** Config key holding an ISO date that replaces today's date as the sign-off date. */
export const SIGN_DATE_VALUE_KEY = 'sign_date_value';

export const CERTIFICATE_CONFIG_KEYS = [
  ...LAYOUT_FIELDS,
  SIGN_DATE_VALUE_KEY,
] as const;

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

function parts(date: IsoDate): { year: string; month: string; day: string } {
  const [year, month, day] = date.split('-');
  return { year, month: MONTHS[Number(month) - 1], day };
}

/** "March 05, 2024" */
export function formatLongDate(date: IsoDate | null): string {
  if (!date) return '';
  const { year, month, day } = parts(date);
  return `${month} ${day}, ${year}`;
}

export function formatDay(date: IsoDate | null): string {
  return date ? parts(date).day : '';
}

export function formatMonth(date: IsoDate | null): string {
  return date ? parts(date).month : '';
}

export function formatYear(date: IsoDate | null): string {
  return date ? parts(date).year : '';
}

export function todayUtc(now: Date = new Date()): IsoDate {
  return now.toISOString().slice(0, 10);
}

/** The instruction file is line-based; line breaks inside a value become spaces. */
export function singleLine(value: string): string {
  return value.replace(/[\r\n]+/g, ' ');
}

export function resolveLayout(config: CertificateConfig, field: LayoutField): string {
  return singleLine(config[field] ?? DEFAULT_LAYOUT[field]);
}

export function resolveSignDate(config: CertificateConfig, now: Date = new Date()): IsoDate {
  return parseIsoDate(config[SIGN_DATE_VALUE_KEY]) ?? todayUtc(now);
}

export const TEMPLATE_FILE = 'template.pptx';

export function headshotFileName(id: string): string {
  return `headshot_${id}.jpg`;
}

export function outputFileName(id: string, ext: 'pptx' | 'png'): string {
  return `output_${id}.${ext}`;
}

export function instructionFileName(id: string): string {
  return `input_${id}.txt`;
}

/**
 * Builds the renderer's instruction file: first line names the template and
 * output, then one image block and one text block per field, each followed
 * by its placement line.
 */
export function buildRenderInstructions(profile: Profile, config: CertificateConfig, now: Date = new Date()): string {
  const textBlock = (text: string, field: LayoutField) =>
    [`txt ${singleLine(text)}`, `${resolveLayout(config, field)} align=left`];

  const lines = [
    `${TEMPLATE_FILE} ${outputFileName(profile.id, 'pptx')}`,
    `img ${headshotFileName(profile.id)}`,
    resolveLayout(config, 'headshot'),
    ...textBlock(`${profile.name_pinyin ?? ''} ${profile.name_cn ?? ''}`, 'name'),
    ...textBlock(formatLongDate(profile.birthday), 'birthday'),
    ...textBlock(formatDay(profile.baptism_date), 'baptism_day'),
    ...textBlock(formatMonth(profile.baptism_date), 'baptism_month'),
    ...textBlock(formatYear(profile.baptism_date), 'baptism_year'),
    ...textBlock(formatLongDate(resolveSignDate(config, now)), 'sign_date'),
  ];
  return `${lines.join('\n')}\n`;
}
