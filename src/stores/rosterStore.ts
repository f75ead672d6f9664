import fs from "fs";
import path from "path";
import {
  Grade,
  Student,
  StudentView,
  addOrUpdateSubject,
  calculateAverage,
  createStudent,
  getGrade,
  isValidStudentId,
  restoreStudent,
  toStudentData,
  toStudentView,
} from "../domain/student";

/**
 * Row of the student list
 */
export interface StudentSummary {
  id: number;
  name: string;
  average: number;
  grade: Grade;
}

/**
 * Everything needed to print one report card
 */
export interface StudentReport extends StudentSummary {
  subjects: Array<{ subject: string; score: number }>;
}

export type UpdateScoreResult =
  | { ok: true; student: StudentView }
  | { ok: false; reason: "not_found" | "invalid_score" };

export type SaveResult =
  | { ok: true; filePath: string; count: number }
  | { ok: false; error: unknown };

export type LoadResult =
  | { status: "loaded"; count: number; warnings: string[] }
  | { status: "missing" }
  | { status: "failed"; reason: "read" | "parse"; error: unknown };

/**
 * RosterStore - owns the ordered list of students and the id counter.
 *
 * The whole roster is kept in memory and written to a single JSON file.
 * Ids are handed out from a counter that only ever moves forward, so
 * deleted ids are never reissued, including across save/load.
 */
export class RosterStore {
  private students: Student[] = [];
  private nextId = 1;

  constructor(readonly filePath: string) {}

  get size(): number {
    return this.students.length;
  }

  /**
   * The id the next added student will get
   */
  peekNextId(): number {
    return this.nextId;
  }

  /**
   * Add a student and return their new id.
   * Returns null for a blank name, or once the id range is used up.
   */
  addStudent(name: string): number | null {
    const trimmedName = name.trim();
    if (!trimmedName || !isValidStudentId(this.nextId)) {
      return null;
    }

    const student = createStudent(this.nextId, trimmedName);
    this.students.push(student);
    this.nextId++;
    return student.id;
  }

  /**
   * Copy of a student; changes go through updateScores
   */
  findStudent(id: number): StudentView | null {
    const student = this.lookup(id);
    return student ? toStudentView(student) : null;
  }

  private lookup(id: number): Student | null {
    return this.students.find((s) => s.id === id) || null;
  }

  /**
   * Set (or overwrite) one subject score for a student
   */
  updateScores(id: number, subject: string, score: number): UpdateScoreResult {
    const student = this.lookup(id);
    if (!student) {
      return { ok: false, reason: "not_found" };
    }
    if (!addOrUpdateSubject(student, subject, score)) {
      return { ok: false, reason: "invalid_score" };
    }
    return { ok: true, student: toStudentView(student) };
  }

  getReport(id: number): StudentReport | null {
    const student = this.lookup(id);
    if (!student) {
      return null;
    }

    return {
      ...summarize(student),
      subjects: Array.from(student.subjects, ([subject, score]) => ({ subject, score })),
    };
  }

  /**
   * All students in insertion order
   */
  listStudents(): StudentSummary[] {
    return this.students.map(summarize);
  }

  deleteStudent(id: number): boolean {
    const index = this.students.findIndex((s) => s.id === id);
    if (index === -1) {
      return false;
    }
    this.students.splice(index, 1);
    return true;
  }

  /**
   * Write the full roster to disk.
   * Writes a temp file next to the target and renames it into place.
   */
  saveToFile(): SaveResult {
    const data = this.students.map(toStudentData);
    const tempPath = `${this.filePath}.tmp`;

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempPath, JSON.stringify(data, null, 2), "utf-8");
      fs.renameSync(tempPath, this.filePath);
      return { ok: true, filePath: this.filePath, count: data.length };
    } catch (err) {
      console.error("Failed to save roster:", err);
      try {
        fs.rmSync(tempPath, { force: true });
      } catch (cleanupErr) {
        console.error("Failed to remove temp roster file:", cleanupErr);
      }
      return { ok: false, error: err };
    }
  }

  /**
   * Replace the roster with the contents of the data file.
   * A missing file is the normal first-run state; any other failure
   * leaves the current roster as it was.
   */
  loadFromFile(): LoadResult {
    if (!fs.existsSync(this.filePath)) {
      return { status: "missing" };
    }

    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, "utf-8");
    } catch (err) {
      console.error("Failed to read roster:", err);
      return { status: "failed", reason: "read", error: err };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      console.error("Failed to parse roster:", err);
      return { status: "failed", reason: "parse", error: err };
    }

    if (!Array.isArray(parsed)) {
      const error = new Error("Roster file must contain a JSON array");
      console.error("Failed to parse roster:", error);
      return { status: "failed", reason: "parse", error };
    }

    const students: Student[] = [];
    const warnings: string[] = [];
    const seenIds = new Set<number>();

    parsed.forEach((entry: unknown, index: number) => {
      const result = restoreStudent(entry);
      if (!result.ok) {
        warnings.push(`entry ${index}: ${result.reason}, skipped`);
        return;
      }
      if (seenIds.has(result.student.id)) {
        warnings.push(`entry ${index}: duplicate id ${result.student.id}, skipped`);
        return;
      }
      seenIds.add(result.student.id);
      students.push(result.student);
      warnings.push(...result.warnings);
    });

    this.students = students;
    for (const student of students) {
      this.nextId = Math.max(this.nextId, student.id + 1);
    }

    for (const warning of warnings) {
      console.warn(`Roster: ${warning}`);
    }

    return { status: "loaded", count: students.length, warnings };
  }
}

function summarize(student: StudentView): StudentSummary {
  return {
    id: student.id,
    name: student.name,
    average: calculateAverage(student),
    grade: getGrade(student),
  };
}

/**
 * Copy a roster file that failed to load to `<file>.bak`, so the
 * exit save does not destroy it. Returns false if the copy failed.
 */
function backUpUnreadableFile(filePath: string): boolean {
  const backupPath = `${filePath}.bak`;
  try {
    fs.copyFileSync(filePath, backupPath);
    console.warn(`Kept a copy of the unreadable roster at ${backupPath}`);
    return true;
  } catch (err) {
    console.error("Failed to back up roster, it will not be overwritten:", err);
    return false;
  }
}

/**
 * Load a roster, hand it to `run`, and always save it afterwards,
 * whether `run` returns normally or throws.
 *
 * If the file exists but could not be loaded, it is backed up first;
 * when even that fails the exit save is skipped.
 */
export async function withRosterStore<T>(
  filePath: string,
  run: (store: RosterStore) => Promise<T>
): Promise<T> {
  const store = new RosterStore(filePath);
  const loaded = store.loadFromFile();
  let saveOnExit = true;
  if (loaded.status === "loaded") {
    console.log(`📂 Loaded ${loaded.count} student(s) from ${filePath}`);
  } else if (loaded.status === "failed") {
    saveOnExit = backUpUnreadableFile(filePath);
  }

  try {
    return await run(store);
  } finally {
    if (saveOnExit) {
      const saved = store.saveToFile();
      if (saved.ok) {
        console.log(`💾 Data saved to ${saved.filePath}`);
      }
    }
  }
}
