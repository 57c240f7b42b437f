import type { LayoutFatal, LayoutResult } from "../validate.js";

export function ok<T>(value: T): LayoutResult<T> {
  return { ok: true, value };
}

export function fail<T>(fatal: LayoutFatal): LayoutResult<T> {
  return { ok: false, fatal };
}
