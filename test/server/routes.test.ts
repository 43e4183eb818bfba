import request from "supertest";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../../src/config.js";
import { EvaluationError, ParseError, SerializationError } from "../../src/filter/errors.js";
import { createApp } from "../../src/server/app.js";
import { statusFor } from "../../src/server/routes.js";

function makeApp(env: Record<string, string> = {}) {
  return createApp(loadConfig(env));
}

const notAlice = {
  Expression: {
    Type: "Not",
    Expression: { Expression: { Expression: { Type: "Is", Expression: { Field: "Name", Value: "alice" } } } },
  },
};

describe("query service", () => {
  it("reports health", async () => {
    const res = await request(makeApp()).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "ok" });
  });

  describe("POST /queries/_parse", () => {
    it("returns the wire form and canonical text", async () => {
      const res = await request(makeApp())
          .post("/queries/_parse")
          .send({ text: 'Name is "bob" and Age > 30' });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        query: {
          Expression: {
            Type: "And",
            Expression: {
              Expressions: [
                { Expression: { Type: "Is", Expression: { Field: "Name", Value: "bob" } } },
                { Expression: { Type: "GT", Expression: { Field: "Age", Value: 30 } } },
              ],
            },
          },
        },
        canonical: '(Name is "bob" and Age > 30)',
      });
    });

    it("prints small and large literals as plain decimals", async () => {
      const res = await request(makeApp()).post("/queries/_parse").send({ text: "X < 0.0000001" });
      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        query: { Expression: { Type: "LT", Expression: { Field: "X", Value: 1e-7 } } },
        canonical: "X < 0.0000001",
      });
    });

    it("writes integers beyond 2^53 exactly", async () => {
      const res = await request(makeApp()).post("/queries/_parse").send({ text: "Id is 9007199254740993" });
      expect(res.status).toBe(200);
      expect(res.text).toBe(
          '{"query":{"Expression":{"Type":"Is","Expression":{"Field":"Id","Value":9007199254740993}}},'
          + '"canonical":"Id is 9007199254740993"}',
      );
    });

    it("maps parse errors to 400", async () => {
      const res = await request(makeApp()).post("/queries/_parse").send({ text: 'Name is "bob' });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "unterminated string at position 8" });
    });

    it("validates the body", async () => {
      const res = await request(makeApp()).post("/queries/_parse").send({ query: "a is 1" });
      expect(res.status).toBe(400);
      expect(typeof res.body.error).toBe("string");
    });

    it("rejects malformed JSON bodies", async () => {
      const res = await request(makeApp())
          .post("/queries/_parse")
          .set("Content-Type", "application/json")
          .send("{bad");
      expect(res.status).toBe(400);
    });
  });

  describe("POST /queries/_stringify", () => {
    it("renders a wire query as text", async () => {
      const res = await request(makeApp()).post("/queries/_stringify").send({ query: notAlice });
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ text: 'not Name is "alice"' });
    });

    it("maps unknown discriminants to 400", async () => {
      const res = await request(makeApp())
          .post("/queries/_stringify")
          .send({ query: { Expression: { Type: "Bogus" } } });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'unrecognized expression type "Bogus" (at $.Expression)' });
    });
  });

  describe("POST /queries/_evaluate", () => {
    it("evaluates a text query against a record", async () => {
      const app = makeApp();
      const hit = await request(app)
          .post("/queries/_evaluate")
          .send({ query: 'Tags contains "go"', record: { Tags: ["go", "news"] } });
      const miss = await request(app)
          .post("/queries/_evaluate")
          .send({ query: 'Tags contains "go"', record: { Tags: ["news"] } });

      expect(hit.body).toEqual({ match: true });
      expect(miss.body).toEqual({ match: false });
    });

    it("accepts wire queries and looseEquality", async () => {
      const app = makeApp();
      const zip = { Expression: { Type: "Is", Expression: { Field: "Zip", Value: 12345 } } };
      const strict = await request(app).post("/queries/_evaluate").send({ query: zip, record: { Zip: "12345" } });
      const loose = await request(app)
          .post("/queries/_evaluate")
          .send({ query: zip, record: { Zip: "12345" }, looseEquality: true });

      expect(strict.body).toEqual({ match: false });
      expect(loose.body).toEqual({ match: true });
    });

    it("reads integers beyond 2^53 in the body exactly", async () => {
      const app = makeApp();
      const send = (id: string) => request(app)
          .post("/queries/_evaluate")
          .set("Content-Type", "application/json")
          .send(`{"query":"Id is 9007199254740993","record":{"Id":${id}}}`);

      expect((await send("9007199254740992")).body).toEqual({ match: false });
      expect((await send("9007199254740993")).body).toEqual({ match: true });
    });

    it("evaluates a wire Not query", async () => {
      const res = await request(makeApp()).post("/queries/_evaluate").send({ query: notAlice, record: { Name: "bob" } });
      expect(res.body).toEqual({ match: true });
    });
  });

  describe("POST /queries/_filter", () => {
    it("returns matching records with counts", async () => {
      const res = await request(makeApp())
          .post("/queries/_filter")
          .send({ query: "Age > 30", records: [{ Name: "a", Age: 35 }, { Name: "b", Age: 20 }, { Name: "c" }] });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ results: [{ Name: "a", Age: 35 }], matched: 1, total: 3 });
    });

    it("enforces the record limit", async () => {
      const res = await request(makeApp({ MAX_RECORDS: "2" }))
          .post("/queries/_filter")
          .send({ query: "Age > 30", records: [{}, {}, {}] });
      expect(res.status).toBe(400);
    });
  });

  describe("POST /queries/_filter/jsonl", () => {
    it("streams back matching lines", async () => {
      const res = await request(makeApp())
          .post("/queries/_filter/jsonl")
          .query({ q: "Age > 30" })
          .set("Content-Type", "application/x-ndjson")
          .send('{"Age":35}\n{"Age":20}\n');

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toMatch(/^application\/x-ndjson/);
      expect(res.text).toBe('{"Age":35}\n');
    });

    it("reports the failing line", async () => {
      const res = await request(makeApp())
          .post("/queries/_filter/jsonl")
          .query({ q: "Age > 30" })
          .set("Content-Type", "application/x-ndjson")
          .send('{"Age":35}\n{oops\n');

      expect(res.status).toBe(400);
      expect(res.body.error).toMatch(/^invalid JSON on line 2: /);
    });

    it("requires the q parameter", async () => {
      const res = await request(makeApp())
          .post("/queries/_filter/jsonl")
          .set("Content-Type", "application/x-ndjson")
          .send('{"Age":35}\n');
      expect(res.status).toBe(400);
    });
  });

  describe("POST /queries/_filter/csv", () => {
    it("returns the header and the matching rows", async () => {
      const res = await request(makeApp())
          .post("/queries/_filter/csv")
          .query({ q: "Age > 30" })
          .set("Content-Type", "text/csv")
          .send("Name,Age\nalice,35\ncarol,20\n");

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toMatch(/^text\/csv/);
      expect(res.text).toBe("Name,Age\nalice,35\n");
    });

    it("enforces the record limit", async () => {
      const res = await request(makeApp({ MAX_RECORDS: "1" }))
          .post("/queries/_filter/csv")
          .query({ q: "Age > 30" })
          .set("Content-Type", "text/csv")
          .send("Name,Age\nalice,35\ncarol,20\n");
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "At most 1 records per request" });
    });

    it("requires a CSV body", async () => {
      const res = await request(makeApp())
          .post("/queries/_filter/csv")
          .query({ q: "Age > 30" })
          .set("Content-Type", "application/x-ndjson")
          .send('{"Age":35}\n');
      expect(res.status).toBe(415);
    });
  });

  describe("POST /queries/_test/yaml", () => {
    it("tests the first document", async () => {
      const app = makeApp();
      const post = (q: string) => request(app)
          .post("/queries/_test/yaml")
          .query({ q })
          .set("Content-Type", "application/yaml")
          .send("Name: bob\nTags: [go, news]\n");

      expect((await post('Tags contains "go"')).body).toEqual({ match: true });
      expect((await post("Name is alice")).body).toEqual({ match: false });
    });

    it("maps YAML errors to 400", async () => {
      const res = await request(makeApp())
          .post("/queries/_test/yaml")
          .query({ q: "a is 1" })
          .set("Content-Type", "application/yaml")
          .send("a: [1, 2\n");
      expect(res.status).toBe(400);
      expect(res.body.error).toMatch(/^invalid YAML in document 1: /);
    });
  });
});

describe("statusFor", () => {
  it("maps error classes to HTTP statuses", () => {
    expect(statusFor(new ParseError("bad", 0))).toBe(400);
    expect(statusFor(new SerializationError("bad"))).toBe(400);
    expect(statusFor(new EvaluationError("bad"))).toBe(422);
    expect(statusFor(new Error("bad"))).toBe(500);
  });
});
