import { describe, expect, test } from "vitest";
import { arrayPublisher, flush, RecordingSubscriber, unsolicitedPublisher } from "./__tests__/integration/helpers";
import {
  FlowClosedError,
  InvalidSettingsError,
  ProtocolViolationError,
  StageFailureError,
  SubscriberRejectedError,
} from "./errors";
import { Flow } from "./flow";
import { FlowMaterializer } from "./materializer";
import { Sink } from "./sink";
import { Source } from "./source";
import { StageState } from "./types";

const materializer = new FlowMaterializer();

describe("FlowMaterializer", () => {
  test("collects a finite source", async () => {
    const handle = Source.from([1, 2, 3]).connect(Sink.collect()).run(materializer);

    await expect(handle.result).resolves.toEqual([1, 2, 3]);
  });

  test("a thunk source ends at undefined and is not called again", async () => {
    const values = [1, 2];
    let calls = 0;
    const source = Source.fromThunk(() => {
      calls++;
      return values.shift();
    });

    const handle = source.connect(Sink.collect()).run(materializer);

    await expect(handle.result).resolves.toEqual([1, 2]);
    await flush();
    expect(calls).toBe(3);
  });

  test("an empty source completes immediately", async () => {
    await expect(Source.from<number>([]).connect(Sink.collect()).run(materializer).result).resolves.toEqual([]);
  });

  test("runs stages in declaration order", async () => {
    const handle = Source.from([1, 2, 3, 4, 5, 6])
      .filter((n) => n % 2 === 0)
      .map((n) => n * 10)
      .mapConcat((n) => [n, n + 1])
      .take(5)
      .connect(Sink.collect())
      .run(materializer);

    await expect(handle.result).resolves.toEqual([20, 21, 40, 41, 60]);
  });

  test("take completes early on an infinite source and cancels it", async () => {
    let n = 0;
    const handle = Source.fromThunk(() => ++n)
      .take(3)
      .connect(Sink.collect())
      .run(materializer);

    await expect(handle.result).resolves.toEqual([1, 2, 3]);
    await flush();
    expect(handle.stageStates()).toEqual([
      { name: "0-thunk", state: StageState.CANCELLED },
      { name: "1-take", state: StageState.COMPLETED },
      { name: "2-collect", state: StageState.COMPLETED },
    ]);
  });

  test("custom transformers can emit on termination", async () => {
    const handle = Source.from([1, 2, 3])
      .transform("sum", () => {
        let total = 0;
        return {
          onNext: (n: number) => {
            total += n;
            return [];
          },
          onTermination: () => [total],
        };
      })
      .connect(Sink.collect())
      .run(materializer);

    await expect(handle.result).resolves.toEqual([6]);
  });

  test("fold and foreach sinks", async () => {
    const seen: string[] = [];

    const folded = Source.from([1, 2, 3]).connect(Sink.fold(10, (sum, n: number) => sum + n)).run(materializer);
    const visited = Source.from(["a", "b"])
      .connect(Sink.foreach((s: string) => seen.push(s)))
      .run(materializer);

    await expect(folded.result).resolves.toBe(16);
    await expect(visited.result).resolves.toBeUndefined();
    expect(seen).toEqual(["a", "b"]);
  });

  test("reports every stage as completed after a successful run", async () => {
    const handle = Source.from([1, 2, 3])
      .map((n) => n + 1)
      .connect(Sink.collect())
      .run(materializer);

    await handle.result;
    expect(handle.stageStates()).toEqual([
      { name: "0-iterable", state: StageState.COMPLETED },
      { name: "1-map", state: StageState.COMPLETED },
      { name: "2-collect", state: StageState.COMPLETED },
    ]);
  });

  test("the microtask scheduler produces the same result", async () => {
    const onMicrotasks = new FlowMaterializer({ scheduler: "microtask" });
    const handle = Source.from([1, 2, 3])
      .map((n) => n * 2)
      .connect(Sink.collect())
      .run(onMicrotasks);

    await expect(handle.result).resolves.toEqual([2, 4, 6]);
  });

  test("small buffers and throughput still deliver everything in order", async () => {
    const tight = new FlowMaterializer({ initialInputBufferSize: 1, maximumInputBufferSize: 1, throughput: 1 });
    const elements = Array.from({ length: 50 }, (_, i) => i);

    const handle = Source.from(elements)
      .map((n) => n)
      .connect(Sink.collect())
      .run(tight);

    await expect(handle.result).resolves.toEqual(elements);
  });

  test("rejects invalid settings on construction", () => {
    expect(() => new FlowMaterializer({ throughput: 0 })).toThrow(InvalidSettingsError);
  });
});

describe("run isolation", () => {
  test("the same runnable flow can run concurrently without interference", async () => {
    const runnable = Source.from([1, 2, 3])
      .map((n) => n * n)
      .connect(Sink.collect());

    const [first, second] = await Promise.all([
      runnable.run(materializer).result,
      runnable.run(materializer).result,
    ]);

    expect(first).toEqual([1, 4, 9]);
    expect(second).toEqual([1, 4, 9]);
  });

  test("per-run transformer state is not shared", async () => {
    const numbered = Flow.create<string>().transform("number", () => {
      let index = 0;
      return { onNext: (s: string) => [`${index++}:${s}`] };
    });
    const runnable = Source.from(["a", "b"]).connect(numbered).connect(Sink.collect());

    await expect(runnable.run(materializer).result).resolves.toEqual(["0:a", "1:b"]);
    await expect(runnable.run(materializer).result).resolves.toEqual(["0:a", "1:b"]);
  });

  test("a shared iterator is exhausted once across runs", async () => {
    const runnable = Source.fromIterator([1, 2, 3][Symbol.iterator]()).connect(Sink.collect());

    await expect(runnable.run(materializer).result).resolves.toEqual([1, 2, 3]);
    await expect(runnable.run(materializer).result).resolves.toEqual([]);
  });

  test("every run gets its own id", () => {
    const runnable = Source.from([1]).connect(Sink.ignore());
    const first = runnable.run(materializer);
    const second = runnable.run(materializer);

    expect(first.id).not.toBe(second.id);
  });
});

describe("failures", () => {
  test("a throwing transformer fails the run with StageFailureError", async () => {
    const handle = Source.from([1, 2, 3])
      .map((n) => {
        if (n === 2) throw new Error("boom");
        return n;
      })
      .connect(Sink.collect())
      .run(materializer);

    await expect(handle.result).rejects.toThrow('Stage "1-map" failed: boom');
    await expect(handle.result).rejects.toBeInstanceOf(StageFailureError);
  });

  test("a throwing sink callback cancels upstream", async () => {
    let n = 0;
    const handle = Source.fromThunk(() => ++n)
      .connect(
        Sink.foreach((value: number) => {
          if (value === 3) throw new Error("sink broke");
        }),
      )
      .run(materializer);

    await expect(handle.result).rejects.toThrow('Stage "1-foreach" failed: sink broke');
    await flush();
    expect(handle.stageStates()).toEqual([
      { name: "0-thunk", state: StageState.CANCELLED },
      { name: "1-foreach", state: StageState.FAILED },
    ]);
  });

  test("a rejected future fails the run with the rejection reason", async () => {
    const reason = new Error("lookup failed");
    const future = new Promise<string>((_, reject) => {
      setTimeout(() => reject(reason), 5);
    });

    const handle = Source.fromFuture(future).connect(Sink.collect()).run(materializer);

    await expect(handle.result).rejects.toBe(reason);
  });

  test("a publisher sending undemanded elements is a protocol violation", async () => {
    const handle = Source.fromPublisher(unsolicitedPublisher([1, 2]))
      .connect(Sink.collect())
      .run(materializer);

    await expect(handle.result).rejects.toBeInstanceOf(ProtocolViolationError);
  });

  test("a transformer factory that throws fails materialization synchronously", () => {
    const runnable = Source.from([1])
      .transform<number>("broken", () => {
        throw new Error("cannot build");
      })
      .connect(Sink.ignore());

    expect(() => runnable.run(materializer)).toThrow('Stage "1-broken" failed: cannot build');
  });

  test("an iterable that cannot produce an iterator fails materialization with StageFailureError", () => {
    const unusable: Iterable<number> = {
      [Symbol.iterator]() {
        throw new Error("no iterator");
      },
    };
    const runnable = Source.from(unusable).connect(Sink.collect());

    expect(() => runnable.run(materializer)).toThrow(StageFailureError);
    expect(() => runnable.run(materializer)).toThrow('Stage "0-iterable" failed: no iterator');
  });
});

describe("taps", () => {
  test("a future emits its value", async () => {
    const handle = Source.fromFuture(Promise.resolve("value")).connect(Sink.collect()).run(materializer);

    await expect(handle.result).resolves.toEqual(["value"]);
  });

  test("an external publisher only receives bounded requests", async () => {
    const elements = Array.from({ length: 10 }, (_, i) => i + 1);
    const publisher = arrayPublisher(elements);

    const handle = Source.fromPublisher(publisher).connect(Sink.collect()).run(materializer);

    await expect(handle.result).resolves.toEqual(elements);
    expect(publisher.requests.length).toBeGreaterThan(0);
    expect(Math.max(...publisher.requests)).toBeLessThanOrEqual(4);
  });

  test("ticks are collected until take completes", async () => {
    let calls = 0;
    const handle = Source.tick(0, 2, () => ++calls)
      .take(3)
      .connect(Sink.collect())
      .run(materializer);

    await expect(handle.result).resolves.toEqual([1, 2, 3]);
  });

  test("tick rejects invalid timing", () => {
    expect(() => Source.tick(0, 0, () => 1)).toThrow(InvalidSettingsError);
    expect(() => Source.tick(-1, 5, () => 1)).toThrow(InvalidSettingsError);
  });
});

describe("publishers", () => {
  test("toPublisher rejects a second subscriber without affecting the first", async () => {
    const publisher = Source.from([1, 2, 3]).toPublisher(materializer);
    const first = new RecordingSubscriber<number>(10);
    const second = new RecordingSubscriber<number>(10);

    publisher.subscribe(first);
    publisher.subscribe(second);

    // Rejection is synchronous
    expect(second.subscribeCount).toBe(1);
    expect(second.error).toBeInstanceOf(SubscriberRejectedError);
    expect(second.error).toHaveProperty("message", 'Publisher of stage "0-iterable" only supports one subscriber');

    await first.done;
    expect(first.elements).toEqual([1, 2, 3]);
    expect(first.completed).toBe(true);
    expect(second.elements).toEqual([]);
  });

  test("toPublisher exposes the last stage", async () => {
    const publisher = Source.from([1, 2])
      .map((n) => `#${n}`)
      .toPublisher(materializer);
    const subscriber = new RecordingSubscriber<string>(5);
    const rejected = new RecordingSubscriber<string>();

    publisher.subscribe(subscriber);
    publisher.subscribe(rejected);

    await subscriber.done;
    expect(subscriber.elements).toEqual(["#1", "#2"]);
    expect(rejected.error).toHaveProperty("message", 'Publisher of stage "1-map" only supports one subscriber');
  });

  test("publishTo feeds an external subscriber and resolves on termination", async () => {
    const subscriber = new RecordingSubscriber<number>(10);

    const handle = Source.from([4, 5]).publishTo(subscriber, materializer);

    await expect(handle.result).resolves.toBeUndefined();
    expect(subscriber.elements).toEqual([4, 5]);
    expect(subscriber.completed).toBe(true);
  });

  test("publishTo reports errors to the subscriber only", async () => {
    const subscriber = new RecordingSubscriber<number>(10);

    const handle = Source.fromThunk<number>(() => {
      throw new Error("no data");
    }).publishTo(subscriber, materializer);

    await expect(handle.result).resolves.toBeUndefined();
    expect(subscriber.error).toBeInstanceOf(StageFailureError);
  });

  test("consume runs the graph for its side effects", async () => {
    const seen: number[] = [];

    const handle = Source.from([1, 2, 3])
      .map((n) => {
        seen.push(n);
        return n;
      })
      .consume(materializer);

    await expect(handle.result).resolves.toBeUndefined();
    expect(seen).toEqual([1, 2, 3]);
  });
});

describe("graph composition", () => {
  test("combinators do not modify their receiver", () => {
    const base = Source.from([1, 2, 3]);
    const mapped = base.map((n) => n * 2).filter((n) => n > 2);

    expect(base.stages).toEqual(["iterable"]);
    expect(mapped.stages).toEqual(["iterable", "map", "filter"]);
  });

  test("flows are reusable values", async () => {
    const double = Flow.create<number>().map((n) => n * 2);
    const doubleThenCollect = double.connect(Sink.collect());

    const viaSource = Source.from([1, 2]).connect(double).connect(Sink.collect());
    const viaSink = Source.from([3]).connect(doubleThenCollect);

    expect(viaSink.stages).toEqual(["iterable", "map", "collect"]);
    await expect(viaSource.run(materializer).result).resolves.toEqual([2, 4]);
    await expect(viaSink.run(materializer).result).resolves.toEqual([6]);
  });

  test("flows compose with flows", async () => {
    const parse = Flow.create<string>().map((s) => Number.parseInt(s, 10));
    const positive = Flow.create<number>().filter((n) => n > 0);

    const handle = Source.from(["3", "-1", "7"]).connect(parse.connect(positive)).connect(Sink.collect()).run(materializer);

    await expect(handle.result).resolves.toEqual([3, 7]);
  });

  test("a runnable flow cannot be extended", () => {
    const runnable = Source.from([1]).connect(Sink.ignore());

    expect(() => runnable.connect(Sink.ignore())).toThrow(FlowClosedError);
  });

  test("adjacent stage types must line up", () => {
    const wire = () => {
      // @ts-expect-error a flow of strings cannot follow a source of numbers
      Source.from([1, 2]).connect(Flow.create<string>());
    };

    expect(typeof wire).toBe("function");
  });
});
