export const EMAIL_PATTERN = /\b[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}\b/g;

// Matches are deduplicated; the returned order is first occurrence.
export function scanEmails(lines: Iterable<string>): string[] {
  const found = new Set<string>();

  for (const line of lines) {
    for (const match of line.matchAll(EMAIL_PATTERN)) {
      found.add(match[0]);
    }
  }

  return [...found];
}

export function formatEmailRecords(emails: readonly string[]): string {
  return emails.map((email) => `${email}\n`).join("");
}
