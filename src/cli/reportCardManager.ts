import { RosterStore } from "../stores/rosterStore";
import { Ask, InputClosedError, askMenu, isDoneAnswer, parseScore, parseWholeNumber } from "./helpers";
import { formatReport, formatStudentTable } from "./reportCard";

export const MENU_OPTIONS = [
  "Add Student",
  "Update Scores (by ID)",
  "View Report (by ID)",
  "Delete Student",
  "List all students",
  "Save now",
  "Exit",
];

/**
 * Main menu loop.
 *
 * Returns when the user picks Exit or input is closed. Saving on the way
 * out is the caller's job (see withRosterStore).
 */
export async function runReportCardManager(ask: Ask, store: RosterStore): Promise<void> {
  try {
    let running = true;
    while (running) {
      const choice = await askMenu(ask, "Student Report Card Manager", MENU_OPTIONS);

      switch (choice) {
        case 1:
          await addStudent(ask, store);
          break;
        case 2:
          await updateScore(ask, store);
          break;
        case 3:
          await viewReport(ask, store);
          break;
        case 4:
          await deleteStudent(ask, store);
          break;
        case 5:
          console.log("");
          formatStudentTable(store.listStudents()).forEach((line) => console.log(line));
          break;
        case 6:
          saveNow(store);
          break;
        case 7:
          console.log("Saving and exiting...");
          running = false;
          break;
      }
    }
  } catch (err) {
    if (!(err instanceof InputClosedError)) {
      throw err;
    }
    console.log("\nInterrupted. Saving before exit...");
  }
}

async function addStudent(ask: Ask, store: RosterStore): Promise<void> {
  const name = (await ask("Student name: ")).trim();
  const id = store.addStudent(name);
  if (id === null) {
    console.log("❌ Name cannot be empty.");
    return;
  }
  console.log(`✅ Added '${name}' with ID ${id}`);

  while (true) {
    const subject = (await ask("Enter subject (or 'done'): ")).trim();
    if (isDoneAnswer(subject)) {
      break;
    }
    const score = parseScore(await ask(`Marks for ${subject} (0-100): `));
    if (score === null) {
      console.log("❌ Invalid score.");
      continue;
    }
    applyScore(store, id, subject, score);
  }
}

async function updateScore(ask: Ask, store: RosterStore): Promise<void> {
  const id = await askStudentId(ask, "Enter student ID: ");
  if (id === null) return;

  const subject = (await ask("Subject name: ")).trim();
  if (!subject) {
    console.log("❌ Subject cannot be empty.");
    return;
  }

  const score = parseScore(await ask("Enter score (0-100): "));
  if (score === null) {
    console.log("❌ Invalid score.");
    return;
  }

  applyScore(store, id, subject, score);
}

async function viewReport(ask: Ask, store: RosterStore): Promise<void> {
  const id = await askStudentId(ask, "Enter student ID: ");
  if (id === null) return;

  const report = store.getReport(id);
  if (!report) {
    console.log("❌ Student not found.");
    return;
  }

  console.log("");
  formatReport(report).forEach((line) => console.log(line));
  console.log("");
}

async function deleteStudent(ask: Ask, store: RosterStore): Promise<void> {
  const id = await askStudentId(ask, "Enter student ID to delete: ");
  if (id === null) return;

  const student = store.findStudent(id);
  if (!student || !store.deleteStudent(id)) {
    console.log("❌ Student not found.");
    return;
  }
  console.log(`🗑️ Deleted ${student.name} (ID ${student.id})`);
}

function saveNow(store: RosterStore): void {
  const result = store.saveToFile();
  if (result.ok) {
    console.log(`💾 Data saved to ${result.filePath}`);
  } else {
    console.log("❌ Failed to save.");
  }
}

async function askStudentId(ask: Ask, query: string): Promise<number | null> {
  const id = parseWholeNumber(await ask(query));
  if (id === null) {
    console.log("❌ Invalid ID.");
  }
  return id;
}

function applyScore(store: RosterStore, id: number, subject: string, score: number): void {
  const result = store.updateScores(id, subject, score);
  if (result.ok) {
    console.log(`✅ ${result.student.name} - ${subject}: ${score}`);
  } else if (result.reason === "not_found") {
    console.log("❌ Student not found.");
  } else {
    console.log("❌ Score must be between 0 and 100.");
  }
}
