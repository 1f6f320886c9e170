import { describe, it, expect, vi } from "vitest";
import type { Schema } from "@wirebox/types";
import { ConfigService } from "../src/config-service";

describe("ConfigService", () => {
  const service = new ConfigService({ DB_HOST: "localhost", DB_PORT: "5432" });

  describe("#get()", () => {
    it("should return a value by key", () => {
      expect(service.get("DB_HOST")).toBe("localhost");
    });

    it("should return undefined for missing key", () => {
      expect(service.get("MISSING")).toBeUndefined();
    });
  });

  describe("#getOrThrow()", () => {
    it("should return value for existing key", () => {
      expect(service.getOrThrow("DB_PORT")).toBe("5432");
    });

    it("should throw for missing key", () => {
      expect(() => service.getOrThrow("MISSING")).toThrow('Config key "MISSING" not found');
    });
  });

  describe("#getAll()", () => {
    it("should return all values as a record", () => {
      expect(service.getAll()).toEqual({ DB_HOST: "localhost", DB_PORT: "5432" });
    });

    it("should return an empty record when constructed without values", () => {
      expect(new ConfigService().getAll()).toEqual({});
    });

    it("should not expose the internal store", () => {
      const all = service.getAll() as Record<string, string>;
      all.DB_HOST = "changed";

      expect(service.get("DB_HOST")).toBe("localhost");
    });
  });

  describe("#parse()", () => {
    it("should pass all values to the schema", () => {
      // Arrange
      const schema: Schema<{ host: string; port: number }> = {
        parse: vi.fn((data: unknown) => {
          const record = data as Record<string, string>;
          return { host: record.DB_HOST ?? "", port: Number(record.DB_PORT) };
        }),
      };

      // Act
      const result = service.parse(schema);

      // Assert
      expect(result).toEqual({ host: "localhost", port: 5432 });
      expect(schema.parse).toHaveBeenCalledWith({ DB_HOST: "localhost", DB_PORT: "5432" });
    });

    it("should propagate schema errors", () => {
      const schema: Schema<never> = {
        parse: () => {
          throw new Error("DB_USER is required");
        },
      };

      expect(() => service.parse(schema)).toThrow("DB_USER is required");
    });
  });
});
