import { StudentReport, StudentSummary } from "../stores/rosterStore";

/**
 * Lines of a single student's report card
 */
export function formatReport(report: StudentReport): string[] {
  const lines = ["--- Report Card ---", `ID: ${report.id}`, `Name: ${report.name}`];

  if (report.subjects.length === 0) {
    lines.push("  (no subjects entered)");
  } else {
    for (const { subject, score } of report.subjects) {
      lines.push(`  ${subject}: ${score}`);
    }
  }

  lines.push(`Average: ${report.average.toFixed(2)}`);
  lines.push(`Grade: ${report.grade}`);
  lines.push("-".repeat(20));
  return lines;
}

/**
 * Lines of the all-students table
 */
export function formatStudentTable(students: StudentSummary[]): string[] {
  if (students.length === 0) {
    return ["No students yet."];
  }

  const lines = [
    padRight("ID", 4) + "| " + padRight("Name", 20) + " | Avg   | Grade",
    "-".repeat(43),
  ];

  for (const s of students) {
    lines.push(
      padRight(String(s.id), 4) + "| " + padRight(s.name, 20) + " | " + s.average.toFixed(2).padStart(5) + " | " + s.grade
    );
  }

  return lines;
}

function padRight(str: string, len: number): string {
  return str.length >= len ? str : str + " ".repeat(len - str.length);
}
