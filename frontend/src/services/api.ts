import axios from "axios";
import type { ApiErrorBody, ExportDocument, SessionAction, SessionView, Summary } from "../types";

const API_BASE = "/api";

const api = axios.create({
  baseURL: API_BASE,
});

export const sessionApi = {
  get: () => api.get<SessionView>("/session"),
  rate: (rating: number, username?: string) =>
    api.post<SessionView>(`/rate/${rating}`, { username }),
  mark: (username?: string) => api.post<SessionView>("/mark", { username }),
  prev: () => api.post<SessionView>("/prev"),
  next: () => api.post<SessionView>("/next"),
  undo: () => api.post<SessionView>("/undo"),
  toggleFilter: () => api.post<SessionView>("/filter"),
};

export const reportApi = {
  summary: () => api.get<Summary>("/summary"),
  export: () => api.get<ExportDocument>("/export"),
};

/** Sends the request behind one keyboard or button action. */
export function performAction(action: SessionAction, username?: string) {
  switch (action.type) {
    case "rate":
      return sessionApi.rate(action.rating, username);
    case "mark":
      return sessionApi.mark(username);
    case "prev":
      return sessionApi.prev();
    case "next":
      return sessionApi.next();
    case "undo":
      return sessionApi.undo();
  }
}

/** The server's `{ detail, code }` body, when the error carries one. */
export function apiErrorBody(error: unknown): ApiErrorBody | null {
  if (!axios.isAxiosError(error)) return null;
  const data: unknown = error.response?.data;
  if (typeof data !== "object" || data === null || !("detail" in data)) return null;
  const { detail } = data;
  if (typeof detail !== "string") return null;
  const code = "code" in data && typeof data.code === "string" ? data.code : "error";
  return { detail, code };
}
