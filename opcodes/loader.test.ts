import { join } from "node:path";
import { createRegistry } from "./registry";
import {
  findDefinition,
  isExtensionDefinition,
  listExtensionFiles,
  loadExtensionDirectory,
} from "./loader";

const FIXTURES = join(__dirname, "__fixtures__", "extensions");

describe("Extension loader", () => {
  let warn: jest.SpyInstance;

  beforeEach(() => {
    warn = jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("isExtensionDefinition", () => {
    it("should accept a complete declaration", () => {
      expect(
        isExtensionDefinition({ name: "X", code: 1, operandBearing: false, execute: () => {} }),
      ).toBe(true);
    });

    it("should reject declarations missing execute", () => {
      expect(isExtensionDefinition({ name: "X", code: 1, operandBearing: false })).toBe(false);
    });

    it("should reject a non-numeric cost", () => {
      expect(
        isExtensionDefinition({
          name: "X",
          code: 1,
          operandBearing: false,
          cost: "2",
          execute: () => {},
        }),
      ).toBe(false);
    });

    it("should reject non-objects", () => {
      expect(isExtensionDefinition(null)).toBe(false);
      expect(isExtensionDefinition("X")).toBe(false);
    });
  });

  describe("findDefinition", () => {
    const def = { name: "X", code: 1, operandBearing: false, execute: () => {} };

    it("should prefer the default export", () => {
      const other = { ...def, name: "Y" };
      expect(findDefinition({ default: def, Y: other })).toBe(def);
    });

    it("should accept the module object itself", () => {
      expect(findDefinition(def)).toBe(def);
    });

    it("should fall back to the first named export", () => {
      expect(findDefinition({ helper: 1, X: def })).toBe(def);
    });

    it("should return null when nothing matches", () => {
      expect(findDefinition({ helper: 1 })).toBeNull();
      expect(findDefinition(undefined)).toBeNull();
    });
  });

  describe("listExtensionFiles", () => {
    it("should list module files in name order, skipping helpers", () => {
      expect(listExtensionFiles(FIXTURES)).toEqual([
        "a-cube.ts",
        "b-square.ts",
        "c-empty.ts",
        "d-broken.ts",
        "e-clash.ts",
      ]);
    });
  });

  describe("loadExtensionDirectory", () => {
    it("should return nothing for a missing directory", () => {
      expect(loadExtensionDirectory(join(FIXTURES, "missing"))).toEqual({
        entries: [],
        rejected: [],
      });
    });

    it("should load declarations and report bad modules", () => {
      const { entries, rejected } = loadExtensionDirectory(FIXTURES);

      expect(entries.map((e) => e.definition.name)).toEqual(["CUBE", "SQUARE", "PUSHX"]);
      expect(entries[0].source).toBe(join(FIXTURES, "a-cube.ts"));

      expect(rejected.map((r) => r.name)).toEqual(["c-empty.ts", "d-broken.ts"]);
      expect(rejected[0].reason).toBe("exports no extension declaration");
      expect(rejected[1].reason).toBe("failed to load: fixture failed to initialise");
      expect(warn).toHaveBeenCalledWith(
        `Warning: extension ${join(FIXTURES, "c-empty.ts")} exports no extension declaration`,
      );
    });

    it("should feed loaded declarations to the registry, rejecting clashes", () => {
      const { entries } = loadExtensionDirectory(FIXTURES);
      const { registry, report } = createRegistry({ extensions: entries });

      expect(registry.lookupByName("CUBE").cost).toBe(2);
      expect(registry.lookupByCode(0x41).name).toBe("SQUARE");
      expect(registry.lookupByCode(0x01).name).toBe("PUSH");
      expect(report.rejected).toEqual([
        {
          name: "PUSHX",
          source: join(FIXTURES, "e-clash.ts"),
          reason: "Opcode value 0x01 is already used by PUSH",
        },
      ]);
    });
  });
});
