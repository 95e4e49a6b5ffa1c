import { DiagnosticIssue } from "../types.js";

type DoctorLine =
  | { kind: "blank" }
  | { kind: "warning"; category: string }
  | { kind: "error"; message: string }
  | { kind: "footer" }
  | { kind: "detail"; text: string };

const WARNING = "Warning:";
const ERROR = "Error:";
const FOOTER = "Please";

export function classifyDoctorLine(line: string): DoctorLine {
  const trimmed = line.trim();
  if (!trimmed) {
    return { kind: "blank" };
  }
  if (trimmed.startsWith(WARNING)) {
    return { kind: "warning", category: trimmed.slice(WARNING.length).trim() };
  }
  if (trimmed.startsWith(ERROR)) {
    return { kind: "error", message: trimmed.slice(ERROR.length).trim() };
  }
  if (trimmed.startsWith(FOOTER)) {
    return { kind: "footer" };
  }
  return { kind: "detail", text: trimmed };
}

/**
 * Single pass over `brew doctor` output. A Warning line opens a category
 * that the following detail lines belong to, up to the next Warning or
 * Error line. Error lines always stand alone.
 */
export function parseDoctorOutput(output: string): DiagnosticIssue[] {
  const issues: DiagnosticIssue[] = [];
  let category = "";

  for (const line of output.split(/\r?\n/)) {
    const parsed = classifyDoctorLine(line);
    switch (parsed.kind) {
      case "warning":
        category = parsed.category;
        break;
      case "error":
        issues.push({ category: "Error", message: parsed.message, severity: "error" });
        category = "";
        break;
      case "detail":
        if (category) {
          issues.push({ category, message: parsed.text, severity: "warning" });
        }
        break;
      case "blank":
      case "footer":
        break;
    }
  }

  return issues;
}
