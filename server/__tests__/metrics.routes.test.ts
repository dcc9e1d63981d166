import { arrayField, field, signupAndLogin, startTestApp, stringField, type TestApp } from "./helpers/testApp";

describe("metric routes", () => {
  let app: TestApp;
  let alice: { userId: string; token: string };
  let bob: { userId: string; token: string };

  beforeEach(async () => {
    app = await startTestApp();
    alice = await signupAndLogin(app, "alice@example.com");
    bob = await signupAndLogin(app, "bob@example.com");
  });

  afterEach(async () => {
    await app.close();
  });

  async function postSteps(token: string, point: Record<string, unknown>) {
    return await app.request("POST", "/api/v1/metric/steps", { token, json: point });
  }

  it("stores a floored step count retrievable from the list endpoint", async () => {
    const created = await postSteps(alice.token, { steps: 1250.7, date: "2025-01-15T10:00:00Z", source: "Watch" });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({
      status: "inserted",
      record: {
        userId: alice.userId,
        kind: "steps",
        recordedAt: "2025-01-15T10:00:00.000Z",
        source: "Watch",
        steps: 1250,
      },
    });

    const list = await app.request("GET", "/api/v1/metric/steps", { token: alice.token });
    expect(list.status).toBe(200);
    expect(list.body).toMatchObject({ totalCount: 1, userId: alice.userId });
    expect(arrayField(list.body, "records")).toEqual([field(created.body, "record")]);
  });

  it("answers a resent point with 200 and the original id", async () => {
    const point = { date: "2025-01-15T10:00:00Z", source: "Watch" };
    const first = await postSteps(alice.token, { ...point, steps: 100 });
    const second = await postSteps(alice.token, { ...point, steps: 300 });

    expect(second.status).toBe(200);
    expect(second.body).toMatchObject({ status: "updated", record: { steps: 300 } });
    expect(stringField(field(second.body, "record"), "id")).toBe(stringField(field(first.body, "record"), "id"));
    expect(app.storage.metricRecords.size).toBe(1);
  });

  it("reports validation failures with field paths", async () => {
    const res = await postSteps(alice.token, { steps: -3, date: "2025-01-15T10:00:00Z", source: "Watch" });
    expect(res.status).toBe(422);
    expect(res.body).toMatchObject({ errors: [{ path: "steps" }] });
  });

  it("hides other users' records", async () => {
    const created = await postSteps(alice.token, { steps: 500, date: "2025-01-15T10:00:00Z", source: "Watch" });
    const id = stringField(field(created.body, "record"), "id");

    const read = await app.request("GET", `/api/v1/metric/steps/${id}`, { token: bob.token });
    expect(read.status).toBe(404);
    expect(read.body).toEqual({ message: "Steps record not found" });

    const removed = await app.request("DELETE", `/api/v1/metric/steps/${id}`, { token: bob.token });
    expect(removed.status).toBe(404);

    const list = await app.request("GET", "/api/v1/metric/steps", { token: bob.token });
    expect(list.body).toMatchObject({ records: [], totalCount: 0, userId: bob.userId });

    const own = await app.request("GET", `/api/v1/metric/steps/${id}`, { token: alice.token });
    expect(own.status).toBe(200);
    expect(own.body).toMatchObject({ id, steps: 500 });
  });

  it("returns 404 for malformed ids and ids of another kind", async () => {
    const created = await postSteps(alice.token, { steps: 500, date: "2025-01-15T10:00:00Z", source: "Watch" });
    const id = stringField(field(created.body, "record"), "id");

    expect((await app.request("GET", "/api/v1/metric/steps/not-a-rid", { token: alice.token })).status).toBe(404);
    expect((await app.request("GET", `/api/v1/metric/miles/${id}`, { token: alice.token })).status).toBe(404);
  });

  it("deletes a record", async () => {
    const created = await postSteps(alice.token, { steps: 500, date: "2025-01-15T10:00:00Z", source: "Watch" });
    const id = stringField(field(created.body, "record"), "id");

    const removed = await app.request("DELETE", `/api/v1/metric/steps/${id}`, { token: alice.token });
    expect(removed.status).toBe(200);
    expect(removed.body).toEqual({ message: "Steps record deleted successfully", deletedCount: 1 });

    expect((await app.request("GET", `/api/v1/metric/steps/${id}`, { token: alice.token })).status).toBe(404);
  });

  it("filters by time range, newest first", async () => {
    const points = [
      { date: "2025-01-15T08:00:00Z", steps: 10 },
      { date: "2025-01-15T10:00:00Z", steps: 20 },
      { date: "2025-01-15T12:00:00Z", steps: 30 },
    ];
    for (const point of points) {
      await postSteps(alice.token, { ...point, source: "Watch" });
    }

    const res = await app.request(
      "GET",
      "/api/v1/metric/steps?start=2025-01-15T09:00:00Z&end=2025-01-15T12:00:00Z",
      { token: alice.token },
    );
    expect(res.status).toBe(200);
    expect(arrayField(res.body, "records").map((record) => field(record, "steps"))).toEqual([30, 20]);
  });

  it("rejects an inverted or unreadable range", async () => {
    const inverted = await app.request(
      "GET",
      "/api/v1/metric/steps?start=2025-01-16T00:00:00Z&end=2025-01-15T00:00:00Z",
      { token: alice.token },
    );
    expect(inverted.status).toBe(422);
    expect(inverted.body).toMatchObject({ errors: [{ path: "start", message: "start must not be after end" }] });

    const unreadable = await app.request("GET", "/api/v1/metric/steps?start=soon", { token: alice.token });
    expect(unreadable.status).toBe(422);
    expect(unreadable.body).toMatchObject({ errors: [{ path: "start" }] });
  });

  describe("bulk", () => {
    it("upserts each point and reports failures by index", async () => {
      const res = await app.request("POST", "/api/v1/metric/heart-rate/bulk", {
        token: alice.token,
        json: {
          records: [
            { heartRate: 61.4, date: "2025-01-15T10:00:00Z", source: "Watch" },
            { heartRate: 400, date: "2025-01-15T11:00:00Z", source: "Watch" },
            { heartRate: 64, restingHr: 52, date: "2025-01-15T10:00:00Z", source: "Watch" },
          ],
        },
      });

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({
        message: "Bulk operation completed: 1 created, 1 updated, 1 failed",
        createdCount: 1,
        updatedCount: 1,
        failedCount: 1,
        totalProcessed: 3,
        errors: [{ index: 1, errors: [{ path: "heartRate" }] }],
      });
      const records = arrayField(res.body, "records");
      expect(records).toHaveLength(2);
      expect(records[1]).toMatchObject({ heartRate: 64, restingHr: 52 });
    });

    it("rejects an empty batch", async () => {
      const res = await app.request("POST", "/api/v1/metric/steps/bulk", { token: alice.token, json: { records: [] } });
      expect(res.status).toBe(422);
      expect(res.body).toMatchObject({ errors: [{ path: "records" }] });
    });

    it("rejects a batch where every point is invalid", async () => {
      const res = await app.request("POST", "/api/v1/metric/steps/bulk", {
        token: alice.token,
        json: { records: [{ steps: 1, date: "2025-01-15T10:00:00Z" }] },
      });
      expect(res.status).toBe(422);
      expect(res.body).toMatchObject({ errors: [{ path: "records.0.source", message: "source is required" }] });
    });
  });

  it("requires authentication", async () => {
    const res = await app.request("POST", "/api/v1/metric/steps", {
      json: { steps: 1, date: "2025-01-15T10:00:00Z", source: "Watch" },
    });
    expect(res.status).toBe(401);
    expect(app.storage.metricRecords.size).toBe(0);
  });
});
