import { InMemoryEventJournal, type EventJournal, type JournalRow } from "./eventJournal.js";
import { ReplayInconsistencyError } from "./middleware/errorHandler.js";
import { persistenceIdOf } from "./shardRouting.js";
import { ViewRegistry } from "./viewRegistry.js";

const USER = "u-1";
const STREAM = persistenceIdOf(USER);

const legsSession = { startDate: "2024-03-01T10:00:00.000Z", muscleGroupKeys: ["legs"], intendedIntensity: 0.7 };

function seedSession(journal: InMemoryEventJournal, sessionId = "S1") {
  journal.append(STREAM, "SessionStarted", { sessionId, sessionProperties: legsSession });
  journal.append(STREAM, "ExerciseObserved", { sessionId, exercise: { name: "squat", intensity: 0.7 } });
}

function setup(options: { journal?: EventJournal; refreshBatchSize?: number } = {}) {
  const clock = { now: 0 };
  const journal = new InMemoryEventJournal();
  const registry = new ViewRegistry({
    journal: options.journal ?? journal,
    passivationTimeoutMs: 360_000,
    refreshBatchSize: options.refreshBatchSize,
    now: () => clock.now,
  });
  return { clock, journal, registry };
}

async function firstExample(registry: ViewRegistry, sessionId?: string) {
  const result = await registry.getExamples({ kind: "GetExamples", userId: USER, sessionId });
  return result.success ? result.data[0] : null;
}

describe("ViewRegistry", () => {
  it("replays the full history before answering the first request", async () => {
    const { journal, registry } = setup({ refreshBatchSize: 1 });
    seedSession(journal);
    journal.append(STREAM, "ExerciseObserved", { sessionId: "S1", exercise: { name: "lunge", intensity: 0.7 } });

    expect(registry.isLive(USER)).toBe(false);
    const result = await registry.getExamples({ kind: "GetExamples", userId: USER, sessionId: "S1" });

    expect(registry.isLive(USER)).toBe(true);
    expect(result.success && result.data.slice(0, 2)).toEqual([
      { name: "squat", intensity: 0.7 },
      { name: "lunge", intensity: 0.7 },
    ]);
  });

  it("answers from memory and picks up new events on refresh", async () => {
    const { journal, registry } = setup();
    seedSession(journal);
    expect(await firstExample(registry, "S1")).toEqual({ name: "squat", intensity: 0.7 });

    journal.append(STREAM, "SessionEnded", { sessionId: "S1" });
    expect(await firstExample(registry, "S1")).toEqual({ name: "squat", intensity: 0.7 });

    await registry.refreshAll();
    expect(await registry.getExamples({ kind: "GetExamples", userId: USER, sessionId: "S1" })).toEqual({
      success: false,
      error: "no_examples",
    });
  });

  it("replaces suggestions on each SuggestionsSet", async () => {
    const { journal, registry } = setup();
    journal.append(STREAM, "SuggestionsSet", {
      suggestionSet: { suggestions: [{ type: "rest", date: "2024-03-05", source: "programme" }] },
    });
    expect(await registry.ask({ kind: "GetSuggestions", userId: USER })).toEqual({
      suggestions: [{ type: "rest", date: "2024-03-05", source: "programme" }],
    });

    journal.append(STREAM, "SuggestionsSet", {
      suggestionSet: { suggestions: [{ type: "rest", date: "2024-03-09", source: "expert" }] },
    });
    await registry.refreshAll();
    expect(await registry.ask({ kind: "GetSuggestions", userId: USER })).toEqual({
      suggestions: [{ type: "rest", date: "2024-03-09", source: "expert" }],
    });
  });

  it("runs requests for one user one at a time", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const reads: number[] = [];
    const slowJournal: EventJournal = {
      async readEvents(_id, afterOffset) {
        reads.push(afterOffset);
        await gate;
        return [];
      },
    };
    const { registry } = setup({ journal: slowJournal });

    const first = registry.getSuggestions({ kind: "GetSuggestions", userId: USER });
    const second = registry.getSuggestions({ kind: "GetSuggestions", userId: USER });
    await new Promise((resolve) => setImmediate(resolve));
    expect(reads).toEqual([0]);

    release();
    await Promise.all([first, second]);

    expect(reads).toEqual([0]);
  });

  it("evicts idle views and rebuilds them on the next request", async () => {
    const { clock, journal, registry } = setup();
    seedSession(journal);
    await firstExample(registry);

    clock.now = 200_000;
    expect(registry.reapIdle()).toBe(0);

    clock.now = 360_000;
    expect(registry.reapIdle()).toBe(1);
    expect(registry.isLive(USER)).toBe(false);

    journal.append(STREAM, "SessionEnded", { sessionId: "S1" });
    expect(await firstExample(registry, "S1")).toBeNull();
    expect(await firstExample(registry)).toEqual({ name: "squat", intensity: 0.7 });
    expect(registry.size).toBe(1);
  });

  it("counts queries as activity", async () => {
    const { clock, registry } = setup();
    await registry.getSuggestions({ kind: "GetSuggestions", userId: USER });

    clock.now = 300_000;
    await registry.getSuggestions({ kind: "GetSuggestions", userId: USER });

    clock.now = 400_000;
    expect(registry.reapIdle()).toBe(0);
    clock.now = 660_000;
    expect(registry.reapIdle()).toBe(1);
  });

  it("fails the request and drops the view on a malformed event", async () => {
    const { journal, registry } = setup();
    journal.append(STREAM, "SessionStarted", { sessionId: "S1" });

    await expect(registry.getSuggestions({ kind: "GetSuggestions", userId: USER })).rejects.toBeInstanceOf(
      ReplayInconsistencyError
    );
    expect(registry.isLive(USER)).toBe(false);
  });

  it("drops the view when a refresh meets a malformed event", async () => {
    const { journal, registry } = setup();
    seedSession(journal);
    await firstExample(registry);

    journal.append(STREAM, "ExerciseObserved", { sessionId: "S1", exercise: { name: "" } });
    const errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    await registry.refreshAll();
    errorSpy.mockRestore();

    expect(registry.isLive(USER)).toBe(false);
  });

  it("rejects offsets that do not increase", async () => {
    const rows: JournalRow[] = [
      { offset: 2, type: "SessionEnded", payload: { sessionId: "S1" } },
      { offset: 2, type: "SessionEnded", payload: { sessionId: "S1" } },
    ];
    const { registry } = setup({ journal: { readEvents: async () => rows } });

    await expect(registry.getSuggestions({ kind: "GetSuggestions", userId: USER })).rejects.toThrow(
      "Journal offset did not increase"
    );
  });

  it("keeps the view when the journal read fails and retries on the next refresh", async () => {
    const memory = new InMemoryEventJournal();
    let failNext = false;
    const flaky: EventJournal = {
      async readEvents(id, after, limit) {
        if (failNext) {
          failNext = false;
          throw new Error("connection reset");
        }
        return memory.readEvents(id, after, limit);
      },
    };
    const { registry } = setup({ journal: flaky });
    await registry.getSuggestions({ kind: "GetSuggestions", userId: USER });

    memory.append(STREAM, "SuggestionsSet", { suggestionSet: { suggestions: [] } });
    memory.append(STREAM, "SuggestionsSet", {
      suggestionSet: { suggestions: [{ type: "rest", date: "2024-03-05", source: "history" }] },
    });
    failNext = true;
    const warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    await registry.refreshAll();
    warnSpy.mockRestore();
    expect(registry.isLive(USER)).toBe(true);

    await registry.refreshAll();
    expect(await registry.getSuggestions({ kind: "GetSuggestions", userId: USER })).toEqual({
      suggestions: [{ type: "rest", date: "2024-03-05", source: "history" }],
    });
  });

  it("folds intensities above 1 like any other value", async () => {
    const { journal, registry } = setup();
    journal.append(STREAM, "SessionStarted", {
      sessionId: "S1",
      sessionProperties: { ...legsSession, intendedIntensity: 1.2 },
    });
    journal.append(STREAM, "ExerciseObserved", { sessionId: "S1", exercise: { name: "squat", intensity: 1.2 } });

    expect(await firstExample(registry, "S1")).toEqual({ name: "squat", intensity: 1.2 });
    expect(await firstExample(registry, "S1")).toEqual({ name: "squat", intensity: 1.2 });
    expect(registry.isLive(USER)).toBe(true);
  });

  it("ignores unknown event types but keeps folding after them", async () => {
    const { journal, registry } = setup();
    journal.append(STREAM, "SessionStarted", { sessionId: "S1", sessionProperties: legsSession });
    journal.append(STREAM, "HeartRateSampled", { bpm: 120 });
    journal.append(STREAM, "ExerciseObserved", { sessionId: "S1", exercise: { name: "squat", intensity: 0.7 } });

    expect(await firstExample(registry, "S1")).toEqual({ name: "squat", intensity: 0.7 });
  });

  describe("background timers", () => {
    beforeEach(() => {
      jest.useFakeTimers();
    });
    afterEach(() => {
      jest.useRealTimers();
    });

    it("refreshes live views on the interval and reaps idle ones", async () => {
      const { clock, journal, registry } = setup();
      registry.start();
      expect(await registry.getSuggestions({ kind: "GetSuggestions", userId: USER })).toEqual({ suggestions: [] });

      journal.append(STREAM, "SuggestionsSet", {
        suggestionSet: { suggestions: [{ type: "rest", date: "2024-03-07", source: "history" }] },
      });
      await jest.advanceTimersByTimeAsync(1_000);

      // запрос встаёт в очередь после обновления и не читает журнал сам
      expect(await registry.getSuggestions({ kind: "GetSuggestions", userId: USER })).toEqual({
        suggestions: [{ type: "rest", date: "2024-03-07", source: "history" }],
      });
      expect(registry.isLive(USER)).toBe(true);

      clock.now = 360_000;
      await jest.advanceTimersByTimeAsync(4_000);
      expect(registry.isLive(USER)).toBe(false);

      registry.stop();
    });
  });

  it("places users on shards and clears views on stop", async () => {
    const { registry } = setup();
    expect(registry.placementOf("hello")).toEqual({ entityKey: "hello", shardId: "2" });

    registry.start();
    await registry.getSuggestions({ kind: "GetSuggestions", userId: USER });
    registry.stop();
    expect(registry.size).toBe(0);
  });
});
