import { createServer } from "node:http";
import type { IncomingMessage, Server } from "node:http";
import type { PanelActions, PanelId, PanelResult } from "./panels.js";
import { isPanelId } from "./panels.js";
import type { RecordStore } from "./records/store.js";
import type { PetProfile } from "./types.js";
import {
  DEFAULT_FORM,
  parseImportedProfile,
  parseProfileForm,
  readFormValues,
} from "./ui/form.js";
import { renderPage } from "./ui/page.js";
import type { PageState } from "./ui/page.js";
import { createTimer } from "./utils/time.js";
import { log } from "./utils/logger.js";

/** Largest form body accepted, in bytes */
export const MAX_BODY_BYTES = 1024 * 1024;

export interface AppRequest {
  method: string;
  url: string;
  body: string;
}

export interface AppResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface AppDeps {
  actions: PanelActions;
  store: RecordStore;
  modelName: string;
  now?: () => Date;
}

const HTML = { "Content-Type": "text/html; charset=utf-8" };
const TEXT = { "Content-Type": "text/plain; charset=utf-8" };

class PayloadTooLargeError extends Error {}

function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > limit) {
        reject(new PayloadTooLargeError(`Request body exceeds ${limit} bytes`));
        // Drain the rest so the response can still be written
        req.removeAllListeners("data");
        req.resume();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}

/**
 * Route one request. Kept free of sockets so it can be called directly.
 */
export function createRequestHandler(deps: AppDeps) {
  const { actions, store, modelName } = deps;
  const now = deps.now ?? (() => new Date());

  function baseState(): PageState {
    return {
      form: { ...DEFAULT_FORM },
      previousJson: "",
      activePanel: "care",
      formErrors: [],
      records: [],
      modelName,
    };
  }

  /** Records are read after the action so a fresh save shows up. */
  function withRecords(state: PageState): PageState {
    try {
      return { ...state, records: store.loadAll() };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(message);
      return { ...state, recordsError: message };
    }
  }

  async function runPanel(
    panel: PanelId,
    profile: PetProfile,
    previous: PetProfile | undefined,
  ): Promise<PanelResult> {
    switch (panel) {
      case "care":
        return actions.careGuide(profile);
      case "emergency":
        return actions.emergency(profile);
      case "training":
        return actions.training(profile);
      case "seasonal":
        return actions.seasonal(profile);
      case "records":
        return actions.saveRecord(profile);
      case "analysis":
        return actions.analysis(profile, previous);
    }
  }

  /** Re-render from a submitted form, optionally running a panel action. */
  async function handleForm(
    body: string,
    panel: PanelId | undefined,
  ): Promise<AppResponse> {
    const params = new URLSearchParams(body);
    const state = baseState();
    state.form = readFormValues(params);
    state.previousJson = params.get("previousReport") ?? "";
    if (panel) state.activePanel = panel;

    if (state.previousJson.trim() !== "") {
      const imported = parseImportedProfile(state.previousJson);
      if (imported.ok) state.previous = imported.profile;
      else state.previousError = imported.error;
    }

    if (panel) {
      const parsed = parseProfileForm(state.form, now());
      if (parsed.ok) {
        log.panel(panel, "running");
        state.result = await runPanel(panel, parsed.profile, state.previous);
      } else {
        state.formErrors = parsed.errors;
      }
    }

    return { status: 200, headers: HTML, body: renderPage(withRecords(state)) };
  }

  return async function handleRequest(req: AppRequest): Promise<AppResponse> {
    const pathname = new URL(req.url, "http://localhost").pathname;

    if (pathname === "/") {
      if (req.method === "GET") {
        return {
          status: 200,
          headers: HTML,
          body: renderPage(withRecords(baseState())),
        };
      }
      if (req.method === "POST") return handleForm(req.body, undefined);
      return { status: 405, headers: { ...TEXT, Allow: "GET, POST" }, body: "Method not allowed" };
    }

    const panel = /^\/panels\/([a-z]+)$/.exec(pathname)?.[1];
    if (panel !== undefined && isPanelId(panel)) {
      if (req.method !== "POST") {
        return { status: 405, headers: { ...TEXT, Allow: "POST" }, body: "Method not allowed" };
      }
      return handleForm(req.body, panel);
    }

    return { status: 404, headers: TEXT, body: "Not found" };
  };
}

/**
 * Serve the application over HTTP.
 */
export function createApp(deps: AppDeps): Server {
  const handleRequest = createRequestHandler(deps);

  return createServer((req, res) => {
    const timer = createTimer();
    const method = req.method ?? "GET";
    const url = req.url ?? "/";

    const send = (response: AppResponse) => {
      res.writeHead(response.status, response.headers);
      res.end(response.body);
      log.request(method, url, response.status, timer.display());
    };

    const body = method === "POST" ? readBody(req, MAX_BODY_BYTES) : Promise.resolve("");
    body
      .then((text) => handleRequest({ method, url, body: text }))
      .then(send)
      .catch((err: unknown) => {
        if (err instanceof PayloadTooLargeError) {
          send({ status: 413, headers: TEXT, body: err.message });
          return;
        }
        log.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
        send({ status: 500, headers: TEXT, body: "Internal server error" });
      });
  });
}
