import { describe, expect, it } from "vitest";
import { OutputTail } from "./output-tail.js";

describe("output tail", () => {
  it("should keep the most recent lines up to the line limit", () => {
    const tail = new OutputTail(3);
    for (const line of ["one", "two", "three", "four"]) {
      tail.push(line);
    }

    expect(tail.lines()).toEqual(["two", "three", "four"]);
    expect(tail.length).toBe(3);
  });

  it("should trim by total size but always keep the newest line", () => {
    const tail = new OutputTail(10, 8);
    tail.push("aaaa");
    tail.push("bbbb");
    tail.push("cccccccccc");

    expect(tail.lines()).toEqual(["cccccccccc"]);
  });

  it("should return the last n lines", () => {
    const tail = new OutputTail();
    tail.push("a");
    tail.push("b");
    tail.push("c");

    expect(tail.lines(2)).toEqual(["b", "c"]);
    expect(tail.lines(0)).toEqual([]);
    expect(tail.lines(10)).toEqual(["a", "b", "c"]);
  });

  it("should clear", () => {
    const tail = new OutputTail();
    tail.push("a");
    tail.clear();

    expect(tail.lines()).toEqual([]);
  });
});
