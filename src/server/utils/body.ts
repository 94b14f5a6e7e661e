import type { Request } from "express";

type JsonBody = Record<string, unknown>;

function isJsonBody(value: unknown): value is JsonBody {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readBody(req: Request): JsonBody {
    const body: unknown = req.body;
    return isJsonBody(body) ? body : {};
}

export function readNonEmptyString(body: JsonBody, key: string): string | undefined {
    const value = body[key];
    return typeof value === "string" && value.trim().length > 0 ? value : undefined;
}
