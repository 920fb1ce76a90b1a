import type { Person, PersonRole } from "../types";

/**
 * The role a person held on the given date (start and end inclusive).
 * When terms overlap the latest-starting one wins.
 */
export function roleAtDate(person: Person, date: Date): PersonRole | null {
  const time = date.getTime();
  let match: PersonRole | null = null;

  for (const role of person.roles) {
    const starts = role.startDate.getTime();
    const ends = role.endDate?.getTime() ?? Number.POSITIVE_INFINITY;
    if (starts <= time && time <= ends) {
      if (!match || starts > match.startDate.getTime()) {
        match = role;
      }
    }
  }

  return match;
}
