import { describe, it } from "mocha";
import { expect } from "chai";

import { ERROR_CODES, GraphFormatError, parseGraphText } from "../../src/index.js";

describe("text graph format", () => {
  it("reads direction, vertices and weighted edges", () => {
    const graph = parseGraphText("D\nA,B,C\n(A,B)\n(B,C,2.5)\n");

    expect(graph.directed).to.equal(true);
    expect(graph.listVertices()).to.deep.equal(["A", "B", "C"]);
    expect(graph.listEdges()).to.deep.equal([
      { from: "A", to: "B" },
      { from: "B", to: "C", weight: 2.5 },
    ]);
  });

  it("builds undirected graphs from a G header and tolerates spacing", () => {
    const graph = parseGraphText("// campus\r\nG\r\n 1 , 2 ,3\r\n\r\n( 1 , 3 )\r\n");

    expect(graph.directed).to.equal(false);
    expect(graph.listVertices()).to.deep.equal(["1", "2", "3"]);
    expect(graph.getNeighbors("3")).to.deep.equal(["1"]);
  });

  it("rejects an unknown header with its line number", () => {
    try {
      parseGraphText("\nX\nA,B\n");
      expect.fail("parseGraphText should have thrown");
    } catch (error) {
      expect(error).to.be.instanceOf(GraphFormatError);
      if (error instanceof GraphFormatError) {
        expect(error.code).to.equal(ERROR_CODES.INPUT_FORMAT);
        expect(error.line).to.equal(2);
        expect(error.message).to.equal("Expected 'D' or 'G' header but found 'X' (line 2)");
      }
    }
  });

  it("reports missing sections", () => {
    expect(() => parseGraphText("")).to.throw(GraphFormatError, "Missing graph header");
    expect(() => parseGraphText("G\n")).to.throw(GraphFormatError, "Missing vertex list (line 1)");
    expect(() => parseGraphText("G\nA,,B\n")).to.throw(GraphFormatError, "Empty vertex key in vertex list (line 2)");
  });

  it("reports malformed edges", () => {
    expect(() => parseGraphText("D\nA,B\nA,B\n")).to.throw(GraphFormatError, "(line 3)");
    expect(() => parseGraphText("D\nA,B\n(A)\n")).to.throw(GraphFormatError, "must have two or three fields (line 3)");
    expect(() => parseGraphText("D\nA,B\n(A,B,x)\n")).to.throw(
      GraphFormatError,
      "Edge weight must be a number but received 'x' (line 3)",
    );
    expect(() => parseGraphText("D\nA,B\n(A,B)\n(A,Q)\n")).to.throw(
      GraphFormatError,
      "Edge references unknown vertex 'Q' (line 4)",
    );
  });
});
