import { z } from 'zod';

export const PROFILE_STATUSES = ['uploaded', 'extracted', 'generated', 'reviewed'] as const;
export type ProfileStatus = (typeof PROFILE_STATUSES)[number];

/** Calendar date in `YYYY-MM-DD` form. */
export type IsoDate = string;

export interface Profile {
  id: string;
  name_cn: string | null;
  name_pinyin: string | null;
  birthday: IsoDate | null;
  baptism_date: IsoDate | null;
  status: ProfileStatus;
}

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses a strict ISO-8601 calendar date. Anything else, including
 * impossible dates such as 2023-02-30, yields null.
 */
export function parseIsoDate(value: unknown): IsoDate | null {
  if (typeof value !== 'string') return null;
  const match = ISO_DATE_RE.exec(value.trim());
  if (!match) return null;
  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year
    || date.getUTCMonth() !== month - 1
    || date.getUTCDate() !== day
  ) {
    return null;
  }
  return `${y}-${m}-${d}`;
}

export function newProfile(id: string): Profile {
  return {
    id,
    name_cn: null,
    name_pinyin: null,
    birthday: null,
    baptism_date: null,
    status: 'uploaded',
  };
}

const nullableText = z.string().nullable().optional().transform((v) => v ?? null);
const nullableDate = z.unknown().transform((v) => parseIsoDate(v));

export const profileSchema = z.object({
  id: z.string().min(1),
  name_cn: nullableText,
  name_pinyin: nullableText,
  birthday: nullableDate,
  baptism_date: nullableDate,
  status: z.enum(PROFILE_STATUSES),
});

const SINGLE_LINE_RE = /^[^\r\n]*$/;

const editText = (max: number) =>
  z.string().max(max).regex(SINGLE_LINE_RE, 'Must be a single line').nullable().optional();

/** Fields an operator may edit by hand. Dates arrive as text. */
export const profileEditSchema = z.object({
  name_cn: editText(200),
  name_pinyin: editText(200),
  birthday: editText(40),
  baptism_date: editText(40),
}).strict();

export type ProfileEdit = z.infer<typeof profileEditSchema>;

/**
 * Applies a manual edit. Only keys present in `edit` change; dates that do not
 * parse are stored as null. Status is never touched.
 */
export function mergeProfile(profile: Profile, edit: ProfileEdit): Profile {
  const next = { ...profile };
  if (edit.name_cn !== undefined) next.name_cn = edit.name_cn;
  if (edit.name_pinyin !== undefined) next.name_pinyin = edit.name_pinyin;
  if (edit.birthday !== undefined) next.birthday = parseIsoDate(edit.birthday);
  if (edit.baptism_date !== undefined) next.baptism_date = parseIsoDate(edit.baptism_date);
  return next;
}

export interface ExtractedFields {
  name_cn: string | null;
  name_pinyin: string | null;
  birthday: IsoDate | null;
  baptism_date: IsoDate | null;
}

export function applyExtraction(profile: Profile, fields: ExtractedFields): Profile {
  return {
    ...profile,
    name_cn: fields.name_cn,
    name_pinyin: fields.name_pinyin,
    birthday: fields.birthday,
    baptism_date: fields.baptism_date,
  };
}
