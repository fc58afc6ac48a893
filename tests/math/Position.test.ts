import { describe, expect, it } from "vitest";
import { InvalidInputError } from "@/errors";
import { Position } from "@/math/Position";

describe("Position", () => {
  describe("create", () => {
    it("should create a frozen planar position", () => {
      const p = Position.create(1, 2);
      expect(p).toEqual([1, 2]);
      expect(Object.isFrozen(p)).toBe(true);
    });

    it("should append auxiliary coordinates after x and y", () => {
      expect(Position.create(1, 2, 3, 4)).toEqual([1, 2, 3, 4]);
    });
  });

  describe("from", () => {
    it("should return a frozen copy of a mutable array", () => {
      const raw = [1, 2, 3];
      const p = Position.from(raw, "p0");

      expect(p).toEqual([1, 2, 3]);
      expect(p).not.toBe(raw);
      expect(Object.isFrozen(p)).toBe(true);
    });

    it("should keep the identity of an already frozen position", () => {
      const p = Position.create(5, 6);
      expect(Position.from(p, "p0")).toBe(p);
    });

    it("should reject null and undefined", () => {
      expect(() => Position.from(null, "p1")).toThrow(InvalidInputError);
      expect(() => Position.from(undefined, "p1")).toThrow("Position p1 is missing");
    });

    it("should reject fewer than 2 coordinates", () => {
      expect(() => Position.from([1], "p2")).toThrow(
        "Position p2 needs at least 2 coordinates, got 1"
      );
    });

    it("should reject non-finite coordinates", () => {
      expect(() => Position.from([0, 1, Number.NaN], "p0")).toThrow(
        "Position p0 has a non-finite coordinate at index 2"
      );
      expect(() => Position.from([Infinity, 1], "p0")).toThrow(InvalidInputError);
    });
  });

  describe("dimension / planar", () => {
    it("should report the number of coordinates", () => {
      expect(Position.dimension(Position.create(0, 0))).toBe(2);
      expect(Position.dimension(Position.create(0, 0, 7, 8))).toBe(4);
    });

    it("should extract planar coordinates", () => {
      expect(Position.planar(Position.create(3, -4, 12))).toEqual({ x: 3, y: -4 });
    });
  });

  describe("equals", () => {
    it("should compare every coordinate exactly", () => {
      expect(Position.equals([1, 2, 3], [1, 2, 3])).toBe(true);
      expect(Position.equals([1, 2, 3], [1, 2, 3.0000001])).toBe(false);
    });

    it("should never equate positions of different dimension", () => {
      expect(Position.equals([1, 2], [1, 2, 0])).toBe(false);
    });

    it("should ignore auxiliary coordinates in planarEquals", () => {
      expect(Position.planarEquals([1, 2, 3], [1, 2, 9])).toBe(true);
      expect(Position.planarEquals([1, 2], [1, 3])).toBe(false);
    });
  });
});
