import { describe, expect, it } from "vitest";
import { formatEmailRecords, scanEmails } from "./emails.js";

describe("scanEmails", () => {
  it("deduplicates matches across a line", () => {
    const emails = scanEmails(["contact: a@b.com, again a@b.com, plus c@d.org"]);
    expect(new Set(emails)).toEqual(new Set(["a@b.com", "c@d.org"]));
    expect(emails).toHaveLength(2);
  });

  it("deduplicates across blocks and keeps first-seen order", () => {
    const emails = scanEmails(["zoe@example.org", "<p>ada@example.com</p>", "ZOE: zoe@example.org"]);
    expect(emails).toEqual(["zoe@example.org", "ada@example.com"]);
  });

  it("accepts the full local-part alphabet", () => {
    expect(scanEmails(["mail first.last+tag_1%x-y@sub.example-mail.co.uk now"])).toEqual([
      "first.last+tag_1%x-y@sub.example-mail.co.uk",
    ]);
  });

  it("requires a top-level domain of at least two letters", () => {
    expect(scanEmails(["user@host", "user@host.c", "user@host.c1"])).toEqual([]);
  });

  it("finds addresses inside xml markup", () => {
    expect(scanEmails(['<w:t xml:space="preserve">Write to sales@example.net</w:t>'])).toEqual([
      "sales@example.net",
    ]);
  });

  it("returns an empty list when nothing matches", () => {
    expect(scanEmails([])).toEqual([]);
    expect(scanEmails(["no addresses here"])).toEqual([]);
  });

  it("finds every match when the same line is scanned twice", () => {
    expect(scanEmails(["a@x.io", "a@x.io b@y.io"])).toEqual(["a@x.io", "b@y.io"]);
  });
});

describe("formatEmailRecords", () => {
  it("terminates every record with a newline", () => {
    expect(formatEmailRecords(["a@b.com", "c@d.org"])).toBe("a@b.com\nc@d.org\n");
  });

  it("renders an empty list as an empty string", () => {
    expect(formatEmailRecords([])).toBe("");
  });
});
