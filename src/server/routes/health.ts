import type { Request, Response } from "express";
import type { SessionStore } from "../../session/store";

export function handleRootRequest(_req: Request, res: Response): void {
    res.json({ message: "Document assistant API", version: "1.0.0" });
}

export function handleHealthRequest(_req: Request, res: Response, sessions: SessionStore): void {
    res.json({ status: "ok", sessions: sessions.size() });
}
