/**
 * Wide Column Schema Tests
 */

import { describe, expect, it } from "vitest";
import { MarketDataError } from "../../lib/errors.ts";
import { readFlag, readInteger, readNumber, resolveWideSchema } from "../column-schema.ts";

const IDENTITY = ["participant.id_in_session", "participant.label"];
const ctx = { sessionCode: "sess1", label: "A" };

describe("Wide Column Schema", () => {
  describe("resolveWideSchema", () => {
    it("should resolve segments in name order and periods in numeric order", () => {
      const schema = resolveWideSchema([
        ...IDENTITY,
        "session.code",
        "zeta.1.player.id_in_group",
        "alpha.10.player.id_in_group",
        "alpha.2.player.id_in_group",
        "alpha.2.player.sold",
        "alpha.2.player.round_1_payoff",
        "alpha.2.player.round_2_payoff",
        "alpha.2.group.id_in_subsession",
      ]);

      expect(schema.sessionCodeColumn).toBe("session.code");
      expect(schema.segments.map((s) => s.name)).toEqual(["alpha", "zeta"]);
      expect(schema.segments[0].periods.map((p) => p.periodIndex)).toEqual([2, 10]);

      const period2 = schema.segments[0].periods[0];
      expect(period2.sold).toBe("alpha.2.player.sold");
      expect(period2.groupId).toBe("alpha.2.group.id_in_subsession");
      expect(period2.signal).toBeUndefined();
      expect([...period2.roundPayoffs.entries()]).toEqual([
        [1, "alpha.2.player.round_1_payoff"],
        [2, "alpha.2.player.round_2_payoff"],
      ]);
    });

    it("should ignore periods and segments with only group columns", () => {
      const schema = resolveWideSchema([
        ...IDENTITY,
        "market.1.player.id_in_group",
        "market.2.group.id_in_subsession",
        "intro.1.group.id_in_subsession",
      ]);

      expect(schema.segments.map((s) => s.name)).toEqual(["market"]);
      expect(schema.segments[0].periods.map((p) => p.periodIndex)).toEqual([1]);
      expect(schema.sessionCodeColumn).toBeNull();
    });

    it("should pick up session metadata columns that exist", () => {
      const schema = resolveWideSchema([...IDENTITY, "session.config.room", "session.is_demo"]);

      expect(schema.metadataColumns).toEqual({
        room: "session.config.room",
        isDemo: "session.is_demo",
      });
      expect(schema.segments).toEqual([]);
    });

    it("should reject headers without the participant id column", () => {
      expect(() => resolveWideSchema(["participant.label"])).toThrow(
        "schema_mismatch: Required column missing: participant.id_in_session",
      );
    });

    it("should reject a column-period without id_in_group", () => {
      try {
        resolveWideSchema([...IDENTITY, "market.3.player.sold"]);
        expect.unreachable("expected a schema error");
      } catch (err) {
        expect(err).toBeInstanceOf(MarketDataError);
        if (err instanceof MarketDataError) {
          expect(err.kind).toBe("schema");
          expect(err.details).toEqual({ segment: "market", periodIndex: 3 });
        }
      }
    });
  });

  describe("cell readers", () => {
    const row = {
      num: " 2.5 ",
      int: "3.0",
      frac: "3.5",
      text: "abc",
      flag: "1",
      badFlag: "2",
      missing: "nan",
      empty: "",
      hex: "0x1",
      exponent: "1e0",
      infinite: "Infinity",
    };

    it("should read numbers and treat missing literals as null", () => {
      expect(readNumber(row, "num", ctx)).toBe(2.5);
      expect(readNumber(row, "missing", ctx)).toBeNull();
      expect(readNumber(row, "empty", ctx)).toBeNull();
      expect(readNumber(row, "absent", ctx)).toBeNull();
      expect(readNumber(row, undefined, ctx)).toBeNull();
    });

    it("should reject non-numeric cells", () => {
      expect(() => readNumber(row, "text", ctx)).toThrow(/invalid_cell/);
      expect(() => readNumber(row, "hex", ctx)).toThrow('Column hex holds non-numeric value "0x1"');
      expect(() => readNumber(row, "infinite", ctx)).toThrow(/non-numeric/);
    });

    it("should accept exponents in numeric cells but not in integer or flag cells", () => {
      expect(readNumber(row, "exponent", ctx)).toBe(1);
      expect(() => readInteger(row, "exponent", ctx)).toThrow('Column exponent holds non-numeric value "1e0"');
      expect(() => readFlag(row, "hex", ctx)).toThrow(/non-numeric/);
    });

    it("should read integers written with a decimal point", () => {
      expect(readInteger(row, "int", ctx)).toBe(3);
      expect(() => readInteger(row, "frac", ctx)).toThrow(/non-integer/);
    });

    it("should read 0/1 flags only", () => {
      expect(readFlag(row, "flag", ctx)).toBe(1);
      expect(readFlag(row, "empty", ctx)).toBeNull();
      expect(() => readFlag(row, "badFlag", ctx)).toThrow(/must be 0 or 1/);
    });
  });
});
