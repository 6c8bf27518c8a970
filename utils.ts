import fs from 'fs';
import { parse } from 'csv-parse';
import { finished, pipeline } from 'stream/promises';
import { distance } from 'fastest-levenshtein';
import { filterOut } from './algebra';
import type { AllocationFailure, IoFailure, Result } from './result';
import { describeFailure, err, ok } from './result';
import type { SetOptions } from './set';
import { CustomSet } from './set';

const paintingKeys = ['school', 'author', 'subject', 'date', 'room'] as const;

export type PaintingFields = Record<typeof paintingKeys[number], string>;

export type PaintingRejection =
  | { kind: 'incomplete', missing: (keyof PaintingFields)[] }
  | { kind: 'invalid-year', date: string }
  | { kind: 'duplicate', painting: Painting };

export class Painting {
  constructor(
    public school: string,
    public author: string,
    public subject: string,
    public date: string,
    public room: string
  ) {}

  get fields(): [string, string, string, string, string] {
    return [this.school, this.author, this.subject, this.date, this.room];
  }

  toString() {
    return this.fields.join(' | ');
  }

  equals(painting: Painting): boolean {
    return this.school === painting.school
      && this.author === painting.author
      && this.subject === painting.subject
      && this.date === painting.date
      && this.room === painting.room;
  }
}

export const paintingEquality = (a: Painting, b: Painting) => a.equals(b);

export const newCatalogue = (options: SetOptions<Painting> = {}) => new CustomSet<Painting>(paintingEquality, options);

// Rejects when the file cannot be read or parsed.
export async function processFile(filename: string, action: (record: string[]) => void) {
  const parser = parse({
    delimiter: ',',
    from_line: 2,
    bom: true,
    trim: true,
    relax_column_count: true
  });
  parser.on('readable', function(){
    let record: string[] | null; while ((record = parser.read()) !== null) {
      action(record);
    }
  });
  await pipeline(fs.createReadStream(filename), parser);
  await finished(parser);
};

/**
 * Adds one painting per CSV row (school, author, subject, date, room).
 * Resolves to the number of rows that were not already in the catalogue.
 */
export async function loadCatalogue(
  filename: string,
  catalogue: CustomSet<Painting>
): Promise<Result<number, AllocationFailure | IoFailure>> {
  const logger = catalogue.options.logger ?? console;
  const rows: string[][] = [];
  try {
    await processFile(filename, (record) => {
      rows.push(record);
    });
  } catch (e) {
    const failure: IoFailure = { kind: 'io', filename, cause: e };
    logger.error(describeFailure(failure));
    return err(failure);
  }
  let added = 0;
  for (const record of rows) {
    if (record.length < 5) {
      logger.error(`Skipping malformed row in ${filename}: ${record.join(',')}`);
      continue;
    }
    const [school, author, subject, date, room] = record;
    const result = catalogue.add(new Painting(school, author, subject, date, room));
    if (!result.ok) {
      logger.error(`Could not add painting from ${filename}: ${describeFailure(result.error)}`);
      return err(result.error);
    }
    if (result.value) {
      added++;
    }
  }
  return ok(added);
}

/**
 * Checked entry of a single painting. Fields are trimmed; every field is
 * required and the date must carry a plausible year.
 */
export const addPainting = (
  catalogue: CustomSet<Painting>,
  fields: PaintingFields
): Result<Painting, PaintingRejection | AllocationFailure> => {
  const painting = new Painting(
    fields.school.trim(),
    fields.author.trim(),
    fields.subject.trim(),
    fields.date.trim(),
    fields.room.trim()
  );
  const missing = paintingKeys.filter((key) => painting[key] === '');
  if (missing.length > 0) {
    return err({ kind: 'incomplete', missing });
  }
  if (findValidYear(painting.date) === 0) {
    return err({ kind: 'invalid-year', date: painting.date });
  }
  const added = catalogue.add(painting);
  if (!added.ok) {
    return added;
  }
  if (!added.value) {
    return err({ kind: 'duplicate', painting });
  }
  return ok(painting);
}

// Case-insensitive substring match on the subject.
export const searchCatalogue = (catalogue: CustomSet<Painting>, text: string) => {
  const needle = text.toLowerCase();
  return filterOut(catalogue, (painting) => painting.subject.toLowerCase().includes(needle));
}

// First run of 3 or 4 digits that reads as a year in [earliest, latest], 0 when there is none.
export const findValidYear = (text: string, earliest = 100, latest = 2024) => {
  const runs = text.match(/\d+/g) ?? [];
  for (const run of runs) {
    if (run.length === 3 || run.length === 4) {
      const year = Number(run);
      if (year >= earliest && year <= latest) {
        return year;
      }
    }
  }
  return 0;
}

export const isNameSimilar = (a: string, b: string) => {
  let a_ = a.toLowerCase();
  let b_ = b.toLowerCase();
  if (a_ === b_) {
    return true;
  }
  return distance(a_, b_) < 3;
}

export const authorsOf = (catalogue: CustomSet<Painting>): Result<CustomSet<string>, AllocationFailure> => {
  return CustomSet.from(
    Array.from(catalogue, (painting) => painting.author),
    isNameSimilar,
    { logger: catalogue.options.logger }
  );
}
