import { describe, it, expect } from "vitest";
import { firstSuccess, skip, success } from "./chain.js";
import type { Provider } from "./chain.js";
import { createMemoryLogger } from "./log.js";

describe("firstSuccess", () => {
  it("returns the first provider that succeeds and stops there", async () => {
    const called: string[] = [];
    const providers: Provider<number>[] = [
      {
        name: "a",
        attempt: () => {
          called.push("a");
          return skip("absent");
        },
      },
      {
        name: "b",
        attempt: async () => {
          called.push("b");
          return success(2);
        },
      },
      {
        name: "c",
        attempt: () => {
          called.push("c");
          return success(3);
        },
      },
    ];

    expect(await firstSuccess(providers)).toEqual({ provider: "b", value: 2 });
    expect(called).toEqual(["a", "b"]);
  });

  it("treats a thrown error as a skip", async () => {
    const log = createMemoryLogger();
    const winner = await firstSuccess(
      [
        { name: "boom", attempt: () => { throw new Error("exploded"); } },
        { name: "ok", attempt: () => success("fine") },
      ],
      log
    );

    expect(winner).toEqual({ provider: "ok", value: "fine" });
    expect(log.messages("debug")).toEqual(["boom: exploded"]);
  });

  it("returns null when every provider skips", async () => {
    const winner = await firstSuccess<number>([
      { name: "a", attempt: () => skip("no") },
      { name: "b", attempt: async () => skip("no") },
    ]);
    expect(winner).toBeNull();
  });

  it("returns null for an empty chain", async () => {
    expect(await firstSuccess([])).toBeNull();
  });
});
