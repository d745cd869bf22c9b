import fs from 'fs';
import { createHash } from 'crypto';
import type { Logger } from 'pino';
import { z } from 'zod';
import { CatalogValidationError, errorMessage } from '../errors';
import { CatalogSnapshot, Course, FilterOptions } from '../types';

const optionalText = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined ? '' : String(v).trim()));

const rawCourseSchema = z.object({
  OfferingName: z.string().min(1),
  SectionName: z.union([z.string().min(1), z.number()]).transform(String),
  Title: z.string().min(1),
  Description: optionalText,
  Department: optionalText,
  SchoolName: optionalText,
  Level: optionalText,
  InstructorsFullName: optionalText,
  Prerequisites: z
    .array(z.object({ Description: optionalText }).passthrough())
    .nullish()
    .transform((list) => (list ?? []).map((p) => p.Description).filter(Boolean)),
  Areas: optionalText,
  Credits: optionalText,
  SeatsAvailable: optionalText,
  Status: optionalText,
  Meetings: optionalText
});

export type RawCourse = z.input<typeof rawCourseSchema>;

function parseAreas(areas: string): string[] {
  if (!areas || areas === 'None') return [];
  return areas
    .split(',')
    .map((a) => a.trim())
    .filter(Boolean);
}

function parseCredits(credits: string): number | null {
  const value = Number.parseFloat(credits);
  return Number.isFinite(value) ? value : null;
}

export function courseIdentifier(offeringName: string, sectionName: string): string {
  return `${offeringName}.${sectionName}`;
}

function toCourse(raw: z.output<typeof rawCourseSchema>): Course {
  return {
    identifier: courseIdentifier(raw.OfferingName, raw.SectionName),
    offeringName: raw.OfferingName,
    sectionName: raw.SectionName,
    title: raw.Title,
    description: raw.Description,
    department: raw.Department,
    school: raw.SchoolName,
    level: raw.Level,
    instructor: raw.InstructorsFullName,
    prerequisites: raw.Prerequisites,
    academicAreas: parseAreas(raw.Areas),
    credits: parseCredits(raw.Credits),
    seats: raw.SeatsAvailable,
    status: raw.Status,
    meetings: raw.Meetings
  };
}

/**
 * Validates raw registry records and freezes them into an immutable snapshot.
 * A record repeating an identifier already seen is skipped.
 */
export function parseCatalog(content: string, logger: Logger): CatalogSnapshot {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err) {
    throw new CatalogValidationError(`not valid JSON (${errorMessage(err)})`, err);
  }

  const parsed = z.array(rawCourseSchema).safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CatalogValidationError(`${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'invalid'}`, parsed.error);
  }

  const seen = new Set<string>();
  const courses: Course[] = [];
  for (const raw of parsed.data) {
    const course = toCourse(raw);
    if (seen.has(course.identifier)) {
      logger.warn({ identifier: course.identifier }, 'duplicate course record skipped');
      continue;
    }
    seen.add(course.identifier);
    courses.push(Object.freeze(course));
  }

  return {
    version: createHash('sha256').update(content).digest('hex').slice(0, 12),
    loadedAt: new Date(),
    courses: Object.freeze(courses)
  };
}

export async function loadCatalogFile(filePath: string, logger: Logger): Promise<CatalogSnapshot> {
  const content = await fs.promises.readFile(filePath, 'utf8');
  const snapshot = parseCatalog(content, logger);
  logger.info({ path: filePath, courses: snapshot.courses.length, version: snapshot.version }, 'catalog loaded');
  return snapshot;
}

function distinctSorted(values: string[]): string[] {
  return Array.from(new Set(values.filter(Boolean))).sort();
}

export function filterOptions(courses: readonly Course[]): FilterOptions {
  return {
    schools: distinctSorted(courses.map((c) => c.school)),
    departments: distinctSorted(courses.map((c) => c.department)),
    levels: distinctSorted(courses.map((c) => c.level)),
    statuses: distinctSorted(courses.map((c) => c.status))
  };
}
