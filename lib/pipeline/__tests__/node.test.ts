import { describe, it, expect, vi } from "vitest";
import { lastValueFrom, toArray, Observable, of, defer, throwError } from "rxjs";
import {
  addNotice,
  defineNode,
  reportProgress,
  resolveNode,
  runNode,
  topicRequest,
  pdfRequest,
} from "../node";
import { testContext } from "./fakes";

function makeCtx() {
  return testContext({ mode: "topic", topic: "A topic long enough", chapterCount: 2 });
}

describe("defineNode", () => {
  it("memoizes the observable per context", async () => {
    let callCount = 0;

    const node = defineNode<string>({
      name: "memo-node",
      resolve: () => {
        callCount++;
        return of("value");
      },
    });

    const ctx = makeCtx();
    const obs1 = node.resolve(ctx);
    const obs2 = node.resolve(ctx);

    expect(obs1).toBe(obs2);
    expect(callCount).toBe(1);

    await lastValueFrom(obs1);
    await lastValueFrom(obs2);
    expect(callCount).toBe(1);
  });

  it("runs the work once for every dependent", async () => {
    const work = vi.fn(async () => "shared");
    const shared = defineNode<string>({ name: "shared", resolve: () => defer(work) });
    const left = defineNode<string>({
      name: "left",
      resolve: (ctx) => defer(async () => `${await resolveNode(shared, ctx)}-left`),
    });
    const right = defineNode<string>({
      name: "right",
      resolve: (ctx) => defer(async () => `${await resolveNode(shared, ctx)}-right`),
    });

    const ctx = makeCtx();
    const results = await Promise.all([resolveNode(left, ctx), resolveNode(right, ctx)]);

    expect(results).toEqual(["shared-left", "shared-right"]);
    expect(work).toHaveBeenCalledOnce();
  });

  it("does not share memoization across different contexts", async () => {
    let callCount = 0;

    const node = defineNode<string>({
      name: "multi-ctx-node",
      resolve: () => {
        callCount++;
        return of("value");
      },
    });

    await lastValueFrom(node.resolve(makeCtx()));
    await lastValueFrom(node.resolve(makeCtx()));

    expect(callCount).toBe(2);
  });

  it("replays a failure to later subscribers", async () => {
    const work = vi.fn(async () => {
      throw new Error("boom");
    });
    const node = defineNode<string>({ name: "failing", resolve: () => defer(work) });
    const ctx = makeCtx();

    await expect(resolveNode(node, ctx)).rejects.toThrow("boom");
    await expect(resolveNode(node, ctx)).rejects.toThrow("boom");
    expect(work).toHaveBeenCalledOnce();
  });
});

describe("resolveNode", () => {
  it("returns the last emitted value", async () => {
    const node = defineNode<string>({
      name: "multi-emit",
      resolve: () =>
        new Observable<string>((sub) => {
          sub.next("progress-1");
          sub.next("final");
          sub.complete();
        }),
    });

    expect(await resolveNode(node, makeCtx())).toBe("final");
  });

  it("rejects if the node completes without emitting", async () => {
    const node = defineNode<string>({
      name: "empty-node",
      resolve: () => new Observable<string>((sub) => sub.complete()),
    });

    await expect(resolveNode(node, makeCtx())).rejects.toThrow(
      'Node "empty-node" completed without emitting a value'
    );
  });
});

describe("runNode", () => {
  it("streams progress and ends with the value", async () => {
    const node = defineNode<number>({
      name: "counting",
      resolve: (ctx) =>
        defer(async () => {
          reportProgress(ctx, "chapters", "Writing", { completed: 0, total: 1 });
          reportProgress(ctx, "chapters", "Writing", { completed: 1, total: 1 });
          return 42;
        }),
    });

    const events = await lastValueFrom(runNode(makeCtx(), node).pipe(toArray()));

    expect(events).toEqual([
      { type: "progress", phase: "chapters", message: "Writing", completed: 0, total: 1 },
      { type: "progress", phase: "chapters", message: "Writing", completed: 1, total: 1 },
      { type: "done", value: 42 },
    ]);
  });

  it("errors when the node fails", async () => {
    const node = defineNode<number>({
      name: "broken",
      resolve: () => throwError(() => new Error("nope")),
    });

    await expect(lastValueFrom(runNode(makeCtx(), node))).rejects.toThrow("nope");
  });
});

describe("context helpers", () => {
  it("collects notices in order", () => {
    const ctx = makeCtx();
    addNotice(ctx, "first");
    addNotice(ctx, "second");
    expect(ctx.notices).toEqual(["first", "second"]);
  });

  it("narrows the request by mode", () => {
    const ctx = makeCtx();
    expect(topicRequest(ctx).chapterCount).toBe(2);
    expect(() => pdfRequest(ctx)).toThrow("Run test-run is not a PDF import");
  });
});
