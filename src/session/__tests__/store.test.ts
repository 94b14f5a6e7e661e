import { describe, expect, it } from "vitest";
import { InMemorySessionStore } from "../store";
import type { EmbeddedChunk } from "../../ingest/types";
import { SessionNotFoundError } from "../../utils/errors";

const chunks: EmbeddedChunk[] = [{ content: "Only chunk.", startPos: 0, endPos: 11, embedding: [1, 0] }];

describe("InMemorySessionStore", () => {
    it("creates sessions with generated ids and frozen chunk lists", () => {
        const store = new InMemorySessionStore();

        const session = store.create({ filename: "notes.txt", chunks });

        expect(session.id).toMatch(/^[0-9a-f-]{36}$/);
        expect(session.filename).toBe("notes.txt");
        expect(session.chunks).toEqual(chunks);
        expect(session.chunks).not.toBe(chunks);
        expect(Object.isFrozen(session.chunks)).toBe(true);
        expect(session.history).toEqual([]);
        expect(Number.isNaN(Date.parse(session.createdAt))).toBe(false);
        expect(store.get(session.id)).toBe(session);
        expect(store.size()).toBe(1);
    });

    it("lists and deletes sessions", () => {
        const store = new InMemorySessionStore();
        store.create({ id: "first", filename: "a.txt", chunks });
        store.create({ id: "second", filename: "b.txt", chunks, uploadDir: "/tmp/uploads/second" });

        expect(store.list()).toEqual(["first", "second"]);
        expect(store.delete("second")?.uploadDir).toBe("/tmp/uploads/second");
        expect(store.delete("second")).toBeUndefined();
        expect(store.list()).toEqual(["first"]);
    });

    it("throws SessionNotFoundError from require for unknown ids", () => {
        const store = new InMemorySessionStore();

        expect(store.get("missing")).toBeUndefined();
        expect(() => store.require("missing")).toThrow(SessionNotFoundError);
        expect(() => store.require("missing")).toThrow("Session not found: missing");
    });

    it("refuses duplicate ids", () => {
        const store = new InMemorySessionStore();
        store.create({ id: "same", filename: "a.txt", chunks });

        expect(() => store.create({ id: "same", filename: "b.txt", chunks })).toThrow("Session already exists: same");
    });
});
