import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { NOT_LOADED, TypeGraphService } from "../src/index.js";
import { shopDescriptors, silentLogger } from "./fixtures/shop.js";

function loadedService(): TypeGraphService {
  const service = new TypeGraphService({ logger: silentLogger });
  const result = service.loadDescriptors(shopDescriptors());
  if (!result.ok) throw new Error(result.error);
  return service;
}

const descriptions = (items: Array<{ description: string }>): string[] =>
  items.map((item) => item.description);

describe("TypeGraphService", () => {
  describe("before loading", () => {
    const service = new TypeGraphService({ logger: silentLogger });

    it("is empty and refuses queries", () => {
      expect(service.isEmpty()).toBe(true);
      expect(service.getType("shop.Order")).toEqual({ ok: false, error: NOT_LOADED });
      expect(service.findCycles()).toEqual({ ok: false, error: NOT_LOADED });
      expect(service.getLoaded()).toEqual({ ok: false, error: NOT_LOADED });
    });
  });

  describe("loadDescriptors", () => {
    it("reports import statistics", () => {
      const service = new TypeGraphService({ logger: silentLogger });
      const result = service.loadDescriptors(shopDescriptors(), "shop");
      if (!result.ok) throw new Error(result.error);

      expect(service.isEmpty()).toBe(false);
      expect(result.value.source).toBe("shop");
      expect(result.value.stats).toEqual({
        types: 5,
        codeUnits: 15,
        accesses: 7,
        unresolvedReferences: 1,
      });
      expect(result.value.unresolved).toEqual([
        { typeId: "ext.Printer", reason: "external", referencedFrom: ["shop.Invoice.print()"] },
      ]);
    });

    it("keeps the previous graph when an import fails", () => {
      const service = loadedService();
      const [object] = shopDescriptors();

      const result = service.loadDescriptors([object, object]);

      expect(result).toEqual({ ok: false, error: "Type id lang.Object is supplied more than once" });
      expect(service.getType("shop.Order").ok).toBe(true);
    });
  });

  describe("load", () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), "typegraph-"));
      await writeFile(join(dir, "shop.json"), JSON.stringify({ types: shopDescriptors() }));
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("imports a descriptor file", async () => {
      const service = new TypeGraphService({ logger: silentLogger });
      const path = join(dir, "shop.json");
      const result = await service.load(path);
      if (!result.ok) throw new Error(result.error);

      expect(result.value.source).toBe(path);
      expect(result.value.stats.types).toBe(5);
    });

    it("returns the load error for a missing file", async () => {
      const service = loadedService();
      const result = await service.load(join(dir, "missing.json"));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toMatch(/^Cannot read .*missing\.json: /);
      }
      expect(service.getLoaded().ok).toBe(true);
    });
  });

  describe("getType", () => {
    const service = loadedService();

    it("finds types by qualified name or unique simple name", () => {
      const byName = service.getType("shop.Order");
      const bySimpleName = service.getType("Order");
      if (!byName.ok || !bySimpleName.ok) throw new Error("expected both lookups to succeed");

      expect(bySimpleName.value).toBe(byName.value);
    });

    it("reports unknown names", () => {
      expect(service.getType("Nope")).toEqual({ ok: false, error: "Type not found: Nope" });
    });

    it("reports ambiguous simple names", () => {
      const ambiguous = new TypeGraphService({ logger: silentLogger });
      const [object] = shopDescriptors();
      ambiguous.loadDescriptors([
        { ...object, id: "a.Util", name: "a.Util", simpleName: "Util", packageName: "a" },
        { ...object, id: "b.Util", name: "b.Util", simpleName: "Util", packageName: "b" },
      ]);

      expect(ambiguous.getType("Util")).toEqual({
        ok: false,
        error: "Type name Util is ambiguous: a.Util, b.Util",
      });
    });
  });

  describe("getHierarchy", () => {
    it("lists superclasses nearest first and subclasses by name", () => {
      const service = loadedService();
      const vip = service.getHierarchy("shop.VipCustomer");
      const root = service.getHierarchy("lang.Object");
      if (!vip.ok || !root.ok) throw new Error("expected both lookups to succeed");

      expect(vip.value.superclasses.map((type) => type.name)).toEqual(["shop.Customer", "lang.Object"]);
      expect(root.value.subclasses.map((type) => type.name)).toEqual([
        "shop.Customer",
        "shop.Invoice",
        "shop.Order",
      ]);
      expect(root.value.allSubclasses.map((type) => type.name)).toEqual([
        "shop.Customer",
        "shop.Invoice",
        "shop.Order",
        "shop.VipCustomer",
      ]);
    });
  });

  describe("getMember", () => {
    const service = loadedService();

    it("finds a field and everything that accesses it", () => {
      const total = service.getMember("shop.Order", "total");
      if (!total.ok) throw new Error(total.error);
      const accesses = service.getAccessesTo(total.value);
      if (!accesses.ok) throw new Error(accesses.error);

      expect(total.value.fullName).toBe("shop.Order.total");
      expect(descriptions(accesses.value)).toEqual([
        "Method <shop.Invoice.print()> gets field <shop.Order.total> in line 30",
        "Method <shop.Order.charge()> gets field <shop.Order.total> in line 12",
        "Constructor <shop.Order.<init>(shop.Customer)> sets field <shop.Order.total> in line 3",
      ]);
    });

    it("finds constructors by parameter types", () => {
      const constructor = service.getMember("shop.Order", "<init>", ["shop.Customer"]);
      if (!constructor.ok) throw new Error(constructor.error);
      expect(constructor.value.kind).toBe("constructor");
    });

    it("lists the candidates when nothing matches", () => {
      const missing = service.getMember("shop.Order", "refund");
      if (missing.ok) throw new Error("expected a failure");
      expect(missing.error).toBe(
        "No code unit refund() in shop.Order; searched " +
          "[shop.Order.charge(), shop.Order.<init>(shop.Customer), shop.Order.<clinit>()]"
      );
    });
  });

  describe("getDependencies", () => {
    const service = loadedService();

    const dependencies = (...args: Parameters<TypeGraphService["getDependencies"]>): string[] => {
      const result = service.getDependencies(...args);
      if (!result.ok) throw new Error(result.error);
      return descriptions(result.value);
    };

    it("lists outgoing dependencies of the type alone", () => {
      expect(dependencies("shop.VipCustomer", "outgoing", "direct")).toEqual([
        "Method <shop.VipCustomer.greet()> calls method <shop.Customer.notify()> in line 40",
      ]);
    });

    it("adds inherited accesses for the hierarchy", () => {
      expect(dependencies("shop.VipCustomer", "outgoing", "hierarchy")).toEqual([
        "Method <shop.VipCustomer.greet()> calls method <shop.Customer.notify()> in line 40",
        "Method <shop.Customer.notify()> calls constructor <shop.Invoice.<init>()> in line 22",
      ]);
    });

    it("lists incoming dependencies, optionally on subclasses too", () => {
      expect(dependencies("shop.Customer", "incoming", "direct")).toEqual([
        "Method <shop.Order.charge()> calls method <shop.Customer.notify()> in line 13",
        "Method <shop.VipCustomer.greet()> calls method <shop.Customer.notify()> in line 40",
      ]);
      expect(dependencies("shop.Customer", "incoming", "hierarchy")).toEqual([
        "Method <shop.Order.charge()> calls method <shop.Customer.notify()> in line 13",
        "Method <shop.VipCustomer.greet()> calls method <shop.Customer.notify()> in line 40",
        "Method <shop.Invoice.upgrade()> calls constructor <shop.VipCustomer.<init>()> in line 32",
      ]);
    });
  });

  describe("findCycles", () => {
    it("returns closed paths", () => {
      const cycles = loadedService().findCycles();
      if (!cycles.ok) throw new Error(cycles.error);

      expect(cycles.value.map((cycle) => cycle.map((type) => type.name))).toEqual([
        ["shop.Customer", "shop.Invoice", "shop.Order", "shop.Customer"],
        ["shop.Customer", "shop.Invoice", "shop.VipCustomer", "shop.Customer"],
      ]);
    });
  });
});
