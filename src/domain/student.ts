/**
 * Student Domain Model
 *
 * A student has a fixed id and name plus a map of subject -> score.
 * Average and grade are always derived from the scores, never stored.
 *
 * Students are only created through the RosterStore, which owns id assignment.
 */

/**
 * Letter grade derived from a student's average
 */
export type Grade = "A" | "B" | "C" | "Fail";

export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

/**
 * Grade bands, highest first. A band matches when average >= minAverage.
 */
export const GRADE_THRESHOLDS: ReadonlyArray<{ grade: Grade; minAverage: number }> = [
  { grade: "A", minAverage: 90 },
  { grade: "B", minAverage: 75 },
  { grade: "C", minAverage: 50 },
];

export interface Student {
  readonly id: number;
  readonly name: string;
  // Subject name -> score (0-100), in entry order. Re-adding a subject overwrites it.
  subjects: Map<string, number>;
}

/**
 * Read-only copy of a student handed out by the roster
 */
export interface StudentView {
  readonly id: number;
  readonly name: string;
  readonly subjects: ReadonlyMap<string, number>;
}

/**
 * Persisted shape of a student (one element of the roster JSON array)
 */
export interface StudentData {
  id: number;
  name: string;
  subjects: Record<string, number>;
}

export type RestoreResult =
  | { ok: true; student: Student; warnings: string[] }
  | { ok: false; reason: string };

export function isValidScore(score: number): boolean {
  return Number.isFinite(score) && score >= MIN_SCORE && score <= MAX_SCORE;
}

/**
 * Ids must stay exact integers after the counter moves past them
 */
export function isValidStudentId(id: unknown): id is number {
  return typeof id === "number" && Number.isSafeInteger(id) && id >= 1 && id < Number.MAX_SAFE_INTEGER;
}

/**
 * Create a new student with no subjects
 */
export function createStudent(id: number, name: string): Student {
  return { id, name, subjects: new Map() };
}

/**
 * Insert or overwrite a subject score.
 * Returns false (and changes nothing) when the score is out of range.
 */
export function addOrUpdateSubject(student: Student, subject: string, score: number): boolean {
  if (!isValidScore(score)) {
    return false;
  }
  student.subjects.set(subject, score);
  return true;
}

/**
 * Mean of all subject scores, or 0 with no subjects
 */
export function calculateAverage(student: StudentView): number {
  const scores = Array.from(student.subjects.values());
  if (scores.length === 0) return 0;
  return scores.reduce((sum, score) => sum + score, 0) / scores.length;
}

export function gradeForAverage(average: number): Grade {
  for (const band of GRADE_THRESHOLDS) {
    if (average >= band.minAverage) return band.grade;
  }
  return "Fail";
}

export function getGrade(student: StudentView): Grade {
  return gradeForAverage(calculateAverage(student));
}

export function toStudentView(student: StudentView): StudentView {
  return { id: student.id, name: student.name, subjects: new Map(student.subjects) };
}

export function toStudentData(student: StudentView): StudentData {
  return {
    id: student.id,
    name: student.name,
    // fromEntries defines own properties, so a "__proto__" subject survives
    subjects: Object.fromEntries(student.subjects),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Rebuild a student from persisted data with its existing id.
 *
 * Does not assign ids; the caller is responsible for keeping its
 * id counter ahead of restored ids. Bad subject scores are dropped
 * and reported as warnings, a bad id or name rejects the record.
 */
export function restoreStudent(data: unknown): RestoreResult {
  if (!isRecord(data)) {
    return { ok: false, reason: "entry is not an object" };
  }

  const { id, name, subjects } = data;
  if (!isValidStudentId(id)) {
    return { ok: false, reason: `invalid id ${JSON.stringify(id)}` };
  }
  if (typeof name !== "string" || name.trim() === "") {
    return { ok: false, reason: `student ${id} has no name` };
  }

  const warnings: string[] = [];
  const student = createStudent(id, name);

  if (isRecord(subjects)) {
    for (const [subject, score] of Object.entries(subjects)) {
      if (typeof score === "number" && addOrUpdateSubject(student, subject, score)) {
        continue;
      }
      warnings.push(`student ${id}: dropped ${subject} (invalid score ${JSON.stringify(score)})`);
    }
  } else if (subjects !== undefined) {
    warnings.push(`student ${id}: subjects is not an object, using none`);
  }

  return { ok: true, student, warnings };
}
