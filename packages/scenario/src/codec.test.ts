import { describe, expect, it } from "vitest";
import { parseScenario, serializeScenario } from "./codec.js";
import { FormatError } from "./errors.js";

const SQUARE = [
  "NAME : square.1",
  "NUMBER OF VERTICES : 4",
  "VEHICLE CAPACITY : 10",
  "NUMBER OF REQUIRED_EDGES : 2",
  "NUMBER OF NON_REQUIRED_EDGES : 2",
  "NUMBER OF VEHICLES : 2",
  "DEPOT: 1",
  "LIST_REQUIRED_EDGES:",
  "(1,2) edge weight 3.0",
  "(3,4) edge weight 4.0",
  "",
  "LIST_NON_REQUIRED_EDGES:",
  "(1,3) edge weight 2.0",
  "(2,4) edge weight 2.0",
  "FAILURE_SCENARIO:",
  "(1,2) disabled",
  "",
].join("\n");

describe("parseScenario", () => {
  it("reads the header fields", () => {
    const scenario = parseScenario(SQUARE);

    expect(scenario.name).toBe("square.1");
    expect(scenario.nodes).toEqual([1, 2, 3, 4]);
    expect(scenario.metadata).toEqual({
      batteryCapacity: 10,
      depots: [1],
      vehicleCount: 2,
      declaredVehicles: 2,
      vertexCount: 4,
    });
  });

  it("splits edges into required and non-required", () => {
    const scenario = parseScenario(SQUARE);

    expect(scenario.edges).toEqual([
      { u: 1, v: 2, weight: 3, required: true },
      { u: 3, v: 4, weight: 4, required: true },
      { u: 1, v: 3, weight: 2, required: false },
      { u: 2, v: 4, weight: 2, required: false },
    ]);
  });

  it("builds an undirected graph", () => {
    const { graph } = parseScenario(SQUARE);

    expect(graph.get(1)).toEqual([
      { toNode: 2, weight: 3, required: true },
      { toNode: 3, weight: 2, required: false },
    ]);
    expect(graph.get(4)?.map((edge) => edge.toNode)).toEqual([3, 2]);
  });

  it("keeps the failure block verbatim without reading it as edges", () => {
    const scenario = parseScenario(SQUARE);

    expect(scenario.failureScenario).toEqual(["(1,2) disabled"]);
    expect(scenario.edges).toHaveLength(4);
    expect(scenario.warnings).toEqual([]);
  });

  it("throws a FormatError when the capacity is missing", () => {
    const text = SQUARE.replace("VEHICLE CAPACITY : 10\n", "");

    expect(() => parseScenario(text)).toThrow(FormatError);
    expect(() => parseScenario(text)).toThrow("VEHICLE CAPACITY not found in file");
  });

  it("rejects a non-positive capacity with its line number", () => {
    const text = SQUARE.replace("VEHICLE CAPACITY : 10", "VEHICLE CAPACITY : 0");

    expect(() => parseScenario(text)).toThrow('line 3: VEHICLE CAPACITY must be a positive number, got "0"');
  });

  it("warns and defaults to 1.0 when an edge has no weight", () => {
    const text = SQUARE.replace("(2,4) edge weight 2.0", "(2,4) demand 3");
    const scenario = parseScenario(text);

    expect(scenario.edges[3]).toEqual({ u: 2, v: 4, weight: 1, required: false });
    expect(scenario.warnings).toEqual([{ kind: "weight-fallback", lineNumber: 14, line: "(2,4) demand 3" }]);
  });

  it("defaults silently when the weight does not parse", () => {
    const text = SQUARE.replace("(2,4) edge weight 2.0", "(2,4) edge weight n/a");
    const scenario = parseScenario(text);

    expect(scenario.edges[3].weight).toBe(1);
    expect(scenario.warnings).toEqual([]);
  });

  it("reads comma and space separated depots", () => {
    const text = SQUARE.replace("DEPOT: 1", "DEPOT: 1, 3 4");
    const scenario = parseScenario(text);

    expect(scenario.metadata.depots).toEqual([1, 3, 4]);
    expect(scenario.metadata.vehicleCount).toBe(3);
  });

  it("allows an empty depot list", () => {
    const scenario = parseScenario(SQUARE.replace("DEPOT: 1", "DEPOT:"));

    expect(scenario.metadata.depots).toEqual([]);
    expect(scenario.metadata.vehicleCount).toBe(0);
  });

  it("picks up depot lines written after the failure block", () => {
    const text = SQUARE.replace("DEPOT: 1\n", "") + "NUMBER OF VEHICLES: 2\nDEPOT: 2,4\n";
    const scenario = parseScenario(text);

    expect(scenario.metadata.depots).toEqual([2, 4]);
    expect(scenario.failureScenario).toEqual(["(1,2) disabled"]);
  });

  it("rejects malformed edge lines", () => {
    const text = SQUARE.replace("(3,4) edge weight 4.0", "(3-4) edge weight 4.0");

    expect(() => parseScenario(text)).toThrow('line 10: malformed edge line "(3-4) edge weight 4.0"');
  });

  it("rejects endpoints outside the declared vertices", () => {
    const text = SQUARE.replace("(3,4) edge weight 4.0", "(3,9) edge weight 4.0");

    expect(() => parseScenario(text)).toThrow("edge (3,9) has an endpoint outside 1..4");
  });

  it("derives nodes from edges when the vertex count is absent", () => {
    const text = SQUARE.replace("NUMBER OF VERTICES : 4\n", "");
    const scenario = parseScenario(text);

    expect(scenario.nodes).toEqual([1, 2, 3, 4]);
    expect(scenario.metadata.vertexCount).toBeNull();
  });

  it("keeps the first position and last attributes of a repeated edge", () => {
    const text = SQUARE.replace("(2,4) edge weight 2.0", "(2,1) edge weight 9");
    const scenario = parseScenario(text);

    expect(scenario.edges).toHaveLength(3);
    expect(scenario.edges[0]).toEqual({ u: 2, v: 1, weight: 9, required: false });
  });
});

describe("serializeScenario", () => {
  it("writes the header, edge lists and failure block", () => {
    const text = serializeScenario(parseScenario(SQUARE));

    expect(text).toBe(
      [
        "NAME: square.1",
        "NUMBER OF VERTICES: 4",
        "NUMBER OF REQUIRED_EDGES: 2",
        "NUMBER OF NON_REQUIRED_EDGES: 2",
        "VEHICLE CAPACITY: 10",
        "NUMBER OF VEHICLES: 2",
        "DEPOT: 1",
        "LIST_REQUIRED_EDGES:",
        "(1,2) edge weight 3",
        "(3,4) edge weight 4",
        "LIST_NON_REQUIRED_EDGES:",
        "(1,3) edge weight 2",
        "(2,4) edge weight 2",
        "FAILURE_SCENARIO:",
        "(1,2) disabled",
        "",
      ].join("\n")
    );
  });

  it("preserves structure through a parse round trip", () => {
    const first = parseScenario(SQUARE);
    const second = parseScenario(serializeScenario(first));

    expect(second.nodes).toEqual(first.nodes);
    expect(second.edges).toEqual(first.edges);
    expect(second.metadata).toEqual(first.metadata);
    expect(second.failureScenario).toEqual(first.failureScenario);
  });

  it("leaves the vertex count out when the input had none", () => {
    const text = ["VEHICLE CAPACITY : 10", "LIST_REQUIRED_EDGES:", "(2,5) edge weight 3", "(5,7) edge weight 1", ""].join("\n");
    const first = parseScenario(text);
    const output = serializeScenario(first);
    const second = parseScenario(output);

    expect(output).not.toContain("NUMBER OF VERTICES");
    expect(second.nodes).toEqual([2, 5, 7]);
    expect(second.edges).toEqual(first.edges);
    expect(second.metadata.vertexCount).toBeNull();
  });

  it("omits the depot line when there are no depots", () => {
    const scenario = parseScenario(SQUARE);
    const text = serializeScenario({ ...scenario, metadata: { ...scenario.metadata, depots: [] } });

    expect(text).not.toContain("DEPOT");
    expect(text).toContain("NUMBER OF VEHICLES: 0\n");
  });
});
