import { describe, it, expect, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import { join } from "node:path";

import { JsonlAuditLog } from "../src/store/audit_log";

describe("JsonlAuditLog", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("creates the directory and appends one JSON object per line", async () => {
    const dir = fs.mkdtempSync(join(os.tmpdir(), "audit-"));
    dirs.push(dir);
    const path = join(dir, "nested", "violations.jsonl");
    const log = new JsonlAuditLog<{ n: number }>(path);

    await log.append({ n: 1 });
    await log.append({ n: 2 });

    expect(fs.readFileSync(path, "utf8")).toBe('{"n":1}\n{"n":2}\n');
  });
});
