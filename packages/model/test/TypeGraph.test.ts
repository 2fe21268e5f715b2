import { describe, it, expect } from "vitest";
import { TypeNotFoundError, hasSimpleName, toName } from "../src/index.js";
import { OBJECT, call, field, get, importGraph, method, shopCodebase, type } from "./fixtures/codebase.js";

describe("TypeGraph", () => {
  describe("lookup", () => {
    const { graph } = importGraph(shopCodebase());

    it("iterates types ordered by name", () => {
      expect([...graph].map(toName)).toEqual(["lang.Object", "shop.Customer", "shop.Order"]);
      expect(graph.size).toBe(3);
    });

    it("finds types by name and by id", () => {
      expect(graph.get("shop.Order").id).toBe("shop.Order");
      expect(graph.getById("shop.Order")).toBe(graph.get("shop.Order"));
      expect(graph.tryGet("shop.Missing")).toBeNull();
      expect(graph.tryGetById("shop.Missing")).toBeNull();
      expect(graph.contains("shop.Customer")).toBe(true);
      expect(graph.contains("shop.Missing")).toBe(false);
    });

    it("lists the searched names when a type is missing", () => {
      expect(() => graph.get("shop.Missing")).toThrow(TypeNotFoundError);
      expect(() => graph.get("shop.Missing")).toThrow(
        "No type shop.Missing in the type graph; searched [lang.Object, shop.Customer, shop.Order]"
      );
    });

    it("filters with predicates", () => {
      expect(graph.that(hasSimpleName("Order")).map(toName)).toEqual(["shop.Order"]);
    });

    it("finds incoming dependencies", () => {
      const incoming = graph.getDependenciesTo(graph.get("shop.Customer"));
      expect(incoming.map((dependency) => dependency.description)).toEqual([
        "Method <shop.Order.charge()> calls method <shop.Customer.notify()> in line 13",
      ]);
    });
  });

  it("refuses a name shared by types with distinct ids", () => {
    const { graph } = importGraph([
      type("app.Util", { id: "module-a" }),
      type("app.Util", { id: "module-b" }),
    ]);

    expect(graph.tryGet("app.Util")).toBeNull();
    expect(() => graph.get("app.Util")).toThrow("2 candidates match type app.Util in the type graph");
    expect(graph.toArray().map((type) => type.id)).toEqual(["module-a", "module-b"]);
  });

  describe("findDependencyCycles", () => {
    it("returns each cycle as a closed path", () => {
      const { graph } = importGraph([
        type("app.A", { methods: [method("run", [], [call("app.B", "run")])] }),
        type("app.B", { methods: [method("run", [], [call("app.A", "run")])] }),
        type("app.C", { methods: [method("run", [], [call("app.A", "run")])] }),
      ]);

      const cycles = graph.findDependencyCycles().map((cycle) => cycle.map(toName));
      expect(cycles).toEqual([["app.A", "app.B", "app.A"]]);
    });

    const callChain = (length: number, closed: boolean) =>
      Array.from({ length }, (_, i) => {
        const next = i + 1 < length ? i + 1 : closed ? 0 : null;
        return type(`app.T${i}`, {
          methods: [method("run", [], next === null ? [] : [call(`app.T${next}`, "run")])],
        });
      });

    it("handles call chains deeper than the call stack", () => {
      const { graph } = importGraph(callChain(10_000, false));
      expect(graph.findDependencyCycles()).toEqual([]);
    }, 20_000);

    it("finds a cycle closing a long chain", () => {
      const { graph } = importGraph(callChain(10_000, true));
      const cycles = graph.findDependencyCycles();

      expect(cycles).toHaveLength(1);
      expect(cycles[0]).toHaveLength(10_001);
      expect(cycles[0][0]).toBe(graph.get("app.T0"));
      expect(cycles[0][10_000]).toBe(graph.get("app.T0"));
    }, 20_000);

    it("finds nothing in an acyclic graph", () => {
      const { graph } = importGraph(shopCodebase());
      expect(graph.findDependencyCycles()).toEqual([]);
    });

    it("ignores accesses of a type to its own members", () => {
      const { graph } = importGraph([
        type(OBJECT),
        type("app.Counter", {
          superclass: OBJECT,
          fields: [field("count")],
          methods: [method("next", [], [get("app.Counter", "count")])],
        }),
      ]);
      expect(graph.findDependencyCycles()).toEqual([]);
    });
  });
});
