import { describe, it, expect } from "vitest";
import {
  UNARY_MAP_OPS,
  generateMapKernel,
  inspectKernelSource,
  toWgslUnaryFunction,
  verifyMapKernel,
} from "@kernloom/backend-webgpu";

const ABS_X_Y = [
  "struct ArrayVector {",
  "    data: array<vec4<f32>>,",
  "};",
  "",
  "@group(0) @binding(0) var<storage, read> x: ArrayVector;",
  "@group(0) @binding(1) var<storage, read_write> y: ArrayVector;",
  "",
  "@compute @workgroup_size(1, 1, 1)",
  "fn main(@builtin(global_invocation_id) global_id: vec3<u32>) {",
  "    let gidx = global_id.x;",
  "    y.data[gidx] = abs(x.data[gidx]);",
  "}",
  "",
].join("\n");

describe("generateMapKernel", () => {
  it("emits the abs kernel for x -> y", () => {
    const kernel = generateMapKernel("x", "y", "abs");
    expect(kernel.code).toBe(ABS_X_Y);
    expect(kernel.entryPoint).toBe("main");
    expect(kernel.workgroupSize).toEqual([1, 1, 1]);
    expect(kernel.opType).toBe("abs");
    expect(kernel.bindings).toEqual([
      { group: 0, binding: 0, name: "x", access: "read" },
      { group: 0, binding: 1, name: "y", access: "write" },
    ]);
  });

  it("is deterministic", () => {
    const a = generateMapKernel("lhs", "result", "floor");
    const b = generateMapKernel("lhs", "result", "floor");
    expect(a.code).toBe(b.code);
    expect(a).toEqual(b);
  });

  it("returns a frozen kernel", () => {
    const kernel = generateMapKernel("x", "y", "abs");
    expect(Object.isFrozen(kernel)).toBe(true);
    expect(Object.isFrozen(kernel.bindings)).toBe(true);
    expect(Object.isFrozen(kernel.bindings[0])).toBe(true);
    expect(Object.isFrozen(kernel.workgroupSize)).toBe(true);
  });

  it("keeps the same structure for every unary op", () => {
    for (const opType of Object.keys(UNARY_MAP_OPS)) {
      const kernel = generateMapKernel("input_0", "output_0", toWgslUnaryFunction(opType));
      expect(verifyMapKernel(kernel)).toEqual([]);

      const inspection = inspectKernelSource(kernel.code);
      expect(inspection.bindings.filter((b) => b.access === "read")).toHaveLength(1);
      expect(inspection.bindings.filter((b) => b.access === "read_write")).toHaveLength(1);
      expect(inspection.entryPoints).toHaveLength(1);
    }
  });

  it("substitutes names and op token verbatim", () => {
    const kernel = generateMapKernel("in_buf_7", "OutBuf", "my_unary");
    const { bindings, calls } = inspectKernelSource(kernel.code);
    expect(bindings.map((b) => b.name)).toEqual(["in_buf_7", "OutBuf"]);
    expect(calls).toEqual(["my_unary"]);
    expect(kernel.code).toContain("    OutBuf.data[gidx] = my_unary(in_buf_7.data[gidx]);\n");
  });

  it("changes only the call token when the op changes", () => {
    const abs = generateMapKernel("x", "y", "abs").code.split("\n");
    const sqrt = generateMapKernel("x", "y", "sqrt").code.split("\n");
    expect(sqrt).toHaveLength(abs.length);

    const changed = abs
      .map((line, i) => (line === sqrt[i] ? -1 : i))
      .filter((i) => i >= 0);
    expect(changed).toEqual([10]);
    expect(abs.join("\n").replace("abs(", "sqrt(")).toBe(sqrt.join("\n"));
  });

  it("generates aliased kernels without complaint (unsafe: in-place read/write)", () => {
    const kernel = generateMapKernel("a", "a", "neg");
    expect(kernel.bindings[0].name).toBe("a");
    expect(kernel.bindings[1].name).toBe("a");
    expect(kernel.code).toContain("@group(0) @binding(0) var<storage, read> a: ArrayVector;");
    expect(kernel.code).toContain("@group(0) @binding(1) var<storage, read_write> a: ArrayVector;");
    expect(kernel.code).toContain("    a.data[gidx] = neg(a.data[gidx]);");
    expect(verifyMapKernel(kernel)).toEqual([]);
  });

  it("passes unknown op names through untouched", () => {
    const kernel = generateMapKernel("x", "y", "not_a_function");
    expect(kernel.code).toContain("y.data[gidx] = not_a_function(x.data[gidx]);");
  });

  it("takes a configurable workgroup size and entry point", () => {
    const kernel = generateMapKernel("x", "y", "exp", { workgroupSize: [64, 1, 1], entryPoint: "map_exp" });
    expect(kernel.code).toContain("@compute @workgroup_size(64, 1, 1)\nfn map_exp(");
    expect(kernel.code).toContain("    let gidx = global_id.x;");
    expect(kernel.workgroupSize).toEqual([64, 1, 1]);
    expect(kernel.entryPoint).toBe("map_exp");
    expect(verifyMapKernel(kernel)).toEqual([]);
  });
});

describe("toWgslUnaryFunction", () => {
  it("takes the function token from the op table", () => {
    expect(toWgslUnaryFunction("Abs")).toBe("abs");
    expect(toWgslUnaryFunction("Foo", { Foo: { fn: "bar" } })).toBe("bar");
  });

  it("lower-cases operators missing from the table", () => {
    expect(toWgslUnaryFunction("Neg")).toBe("neg");
    expect(toWgslUnaryFunction("toString")).toBe("tostring");
  });
});
