import { AxiosError, AxiosHeaders, type AxiosResponse } from "axios";
import type { ApiErrorBody, SessionView } from "../types";

export function makeView(overrides: Partial<SessionView> = {}): SessionView {
  return {
    title: "Test rater",
    description: "Rate sharpness",
    num_classes: 5,
    images_folder: "photos",
    index: 0,
    total: 3,
    image_identifier: "a.jpg",
    image_url: "/images/a.jpg",
    rating: 0,
    marked: false,
    stats: { total: 3, annotated: 0, marked: 0, remaining: 3, percentage: 0 },
    can_undo: false,
    history_size: 0,
    filter_unannotated: false,
    at_start: true,
    at_end: false,
    ...overrides,
  };
}

export function ok<T>(data: T): AxiosResponse<T> {
  return {
    data,
    status: 200,
    statusText: "OK",
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

export function apiFailure(status: number, body: ApiErrorBody): AxiosError<ApiErrorBody> {
  return new AxiosError("Request failed", "ERR_BAD_RESPONSE", undefined, undefined, {
    data: body,
    status,
    statusText: "",
    headers: {},
    config: { headers: new AxiosHeaders() },
  });
}
