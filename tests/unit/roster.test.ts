import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ZodError } from "zod";
import { _resetRosterCache, getRoleProfile, listRoles, parseRoster } from "../../src/roles/roster.js";

const ROLE = {
  id: "dana",
  name: "Dana",
  title: "QA Lead",
  location: "Test lab",
  activity: "Filing bugs",
  personality: "thorough",
  expertise: "test plans",
  style: "dry humour",
  hobbies: "puzzles",
};

describe("NPC roster", () => {
  afterEach(() => {
    _resetRosterCache();
    vi.unstubAllEnvs();
  });

  it("indexes roles by id", () => {
    const roster = parseRoster(JSON.stringify([ROLE, { ...ROLE, id: "eli", name: "Eli" }]));

    expect([...roster.keys()]).toEqual(["dana", "eli"]);
    expect(roster.get("eli")?.name).toBe("Eli");
  });

  it("rejects duplicate ids", () => {
    expect(() => parseRoster(JSON.stringify([ROLE, ROLE]))).toThrow(
      'Invalid NPC roster. 1.id: Duplicate NPC id "dana"',
    );
  });

  it("reports every issue in a plain error", () => {
    let thrown: unknown;
    try {
      parseRoster(JSON.stringify([{ id: "dana" }]));
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(Error);
    expect(thrown).not.toBeInstanceOf(ZodError);
    expect(thrown).toHaveProperty(
      "message",
      expect.stringMatching(/^Invalid NPC roster\. 0\.name: Required; 0\.title: Required;/),
    );
  });

  it("accepts optional idle lines per part of the day", () => {
    const idleLines = { morning: "m", noon: "n", afternoon: "a", evening: "e" };
    const roster = parseRoster(JSON.stringify([{ ...ROLE, idleLines }]));

    expect(roster.get("dana")?.idleLines).toEqual(idleLines);
  });

  it("rejects ids outside lowercase letters, digits, dash and underscore", () => {
    expect(() => parseRoster(JSON.stringify([{ ...ROLE, id: "Dana Smith" }]))).toThrow();
  });

  it("rejects a role missing a field", () => {
    const { title: _title, ...withoutTitle } = ROLE;
    expect(() => parseRoster(JSON.stringify([withoutTitle]))).toThrow();
  });

  it("loads the bundled roster by default", () => {
    expect(listRoles().map((role) => role.id)).toEqual(["ada", "bruno", "cleo"]);
    expect(getRoleProfile("cleo")?.title).toBe("UI Designer");
    expect(getRoleProfile("nobody")).toBeNull();
  });

  it("loads the roster named by NPC_ROSTER_PATH", () => {
    const dir = mkdtempSync(join(tmpdir(), "npc-roster-"));
    const path = join(dir, "roles.json");
    writeFileSync(path, JSON.stringify([ROLE]));
    vi.stubEnv("NPC_ROSTER_PATH", path);

    expect(listRoles()).toEqual([ROLE]);
    expect(getRoleProfile("ada")).toBeNull();
  });

  it("names the roster file when it cannot be loaded", () => {
    const dir = mkdtempSync(join(tmpdir(), "npc-roster-"));
    const path = join(dir, "roles.json");
    writeFileSync(path, "[{");
    vi.stubEnv("NPC_ROSTER_PATH", path);

    expect(() => listRoles()).toThrow(`Failed to load NPC roster (${path}):`);
  });
});
