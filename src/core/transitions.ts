import { CaseStatus } from "../types/contracts.js";

// Closed cases never reopen; further contact starts a new case.
const allowed: Record<CaseStatus, CaseStatus[]> = {
  open: ["closed"],
  closed: []
};

export function canTransition(from: CaseStatus, to: CaseStatus): boolean {
  return allowed[from].includes(to);
}
