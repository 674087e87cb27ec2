import { describe, expect, test } from "vitest";
import { InvalidSettingsError, SlowSubscriberError } from "../../errors";
import { FlowMaterializer } from "../../materializer";
import { Source } from "../../source";
import { flush, RecordingSubscriber, waitFor } from "./helpers";

const materializer = new FlowMaterializer();

describe("toFanoutPublisher", () => {
  test("drops a subscriber that falls more than maximumBufferSize behind", async () => {
    const elements = Array.from({ length: 10 }, (_, i) => i + 1);
    const publisher = Source.from(elements).toFanoutPublisher(1, 2, materializer);
    const fast = new RecordingSubscriber<number>(100);
    const slow = new RecordingSubscriber<number>();

    publisher.subscribe(fast);
    publisher.subscribe(slow);

    await Promise.all([fast.done, slow.done]);

    expect(fast.elements).toEqual(elements);
    expect(fast.completed).toBe(true);

    expect(slow.elements).toEqual([]);
    expect(slow.error).toBeInstanceOf(SlowSubscriberError);
    expect(slow.error).toHaveProperty("message", "Subscriber dropped: backlog of 3 exceeds maximum buffer size 2");
    expect(slow.error).toHaveProperty("stageName", "1-fanout");
  });

  test("every subscriber keeping up receives every element", async () => {
    const publisher = Source.from(["a", "b", "c"]).toFanoutPublisher(2, 4, materializer);
    const first = new RecordingSubscriber<string>(10);
    const second = new RecordingSubscriber<string>(10);

    publisher.subscribe(first);
    publisher.subscribe(second);
    await Promise.all([first.done, second.done]);

    expect(first.elements).toEqual(["a", "b", "c"]);
    expect(second.elements).toEqual(["a", "b", "c"]);
    expect(first.completed && second.completed).toBe(true);
  });

  test("a late subscriber only sees elements produced after it attached", async () => {
    let n = 0;
    const publisher = Source.fromThunk(() => n++).toFanoutPublisher(1, 4, materializer);
    const early = new RecordingSubscriber<number>(2);

    publisher.subscribe(early);
    await waitFor(() => early.elements.length === 2);

    const late = new RecordingSubscriber<number>(2);
    publisher.subscribe(late);
    await waitFor(() => late.elements.length === 2);

    expect(early.elements).toEqual([0, 1]);
    expect(late.elements).toEqual([2, 3]);

    early.cancel();
    late.cancel();
  });

  test("upstream is cancelled once every subscriber is gone", async () => {
    let n = 0;
    const publisher = Source.fromThunk(() => n++).toFanoutPublisher(1, 4, materializer);
    const first = new RecordingSubscriber<number>(1);
    const second = new RecordingSubscriber<number>(1);

    publisher.subscribe(first);
    publisher.subscribe(second);
    await waitFor(() => first.elements.length === 1 && second.elements.length === 1);

    first.cancel();
    await flush();
    second.request(1);
    await waitFor(() => second.elements.length === 2);

    second.cancel();
    await flush();
    const produced = n;
    await flush();

    expect(n).toBe(produced);
    expect(second.elements).toEqual([0, 1]);

    // The fan-out stage is gone: newcomers are completed right away
    const newcomer = new RecordingSubscriber<number>(1);
    publisher.subscribe(newcomer);
    expect(newcomer.completed).toBe(true);
  });

  test("a subscriber arriving after completion is completed immediately", async () => {
    const publisher = Source.from([1]).toFanoutPublisher(1, 1, materializer);
    const first = new RecordingSubscriber<number>(10);
    publisher.subscribe(first);
    await first.done;
    await flush();

    const late = new RecordingSubscriber<number>(1);
    publisher.subscribe(late);

    expect(late.completed).toBe(true);
    expect(late.elements).toEqual([]);
  });

  test("validates buffer sizes synchronously", () => {
    const source = Source.from([1, 2, 3]);

    expect(() => source.toFanoutPublisher(0, 2, materializer)).toThrow(InvalidSettingsError);
    expect(() => source.toFanoutPublisher(4, 2, materializer)).toThrow(
      "Invalid fan-out buffer sizes: initialBufferSize: initialBufferSize must not exceed maximumBufferSize",
    );
  });

  test("buffer sizes default to the materializer settings", async () => {
    const configured = new FlowMaterializer({ initialFanOutBufferSize: 1, maximumFanOutBufferSize: 1 });
    const publisher = configured.toFanoutPublisher(Source.from([1, 2, 3, 4]));
    const fast = new RecordingSubscriber<number>(10);
    const slow = new RecordingSubscriber<number>();

    publisher.subscribe(fast);
    publisher.subscribe(slow);
    await Promise.all([fast.done, slow.done]);

    expect(fast.elements).toEqual([1, 2, 3, 4]);
    expect(slow.error).toHaveProperty("message", "Subscriber dropped: backlog of 2 exceeds maximum buffer size 1");
  });
});
