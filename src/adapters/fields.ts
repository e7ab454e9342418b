import * as cheerio from "cheerio"

import { MISSING_VALUE } from "../harvest/types.js"
import type { ExtractedFields, FieldValue } from "./types.js"

export const missing: FieldValue = { kind: "missing" }

export const present = (value: string): FieldValue => ({ kind: "present", value })

export const normalizeSpaces = (text: string): string =>
  text
    .replaceAll("\n", " ")
    .replaceAll("\t", " ")
    .replaceAll("\r", " ")
    .replaceAll("\u00a0", " ")
    .split(" ")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .join(" ")

/** Present when the normalized text is non-empty. */
export const fromText = (text: string | null | undefined): FieldValue => {
  if (text === null || text === undefined) {
    return missing
  }
  const normalized = normalizeSpaces(text)
  return normalized ? present(normalized) : missing
}

export const resolveFieldValue = (field: FieldValue): string =>
  field.kind === "present" ? field.value : MISSING_VALUE

/** Normalized text of every node matching a selector, in document order. */
export type TextQuery = (selector: string) => string[]

export const queryDocument = ($: cheerio.CheerioAPI): TextQuery => {
  return (selector) =>
    $(selector)
      .toArray()
      .map((node) => normalizeSpaces($(node).text()))
}

export const loadDocument = (html: string): TextQuery => queryDocument(cheerio.load(html))

/** First non-empty text across selectors, tried in order. */
export const selectText = (query: TextQuery, ...selectors: string[]): FieldValue => {
  for (const selector of selectors) {
    const text = query(selector).find((value) => value.length > 0)
    if (text !== undefined) {
      return present(text)
    }
  }
  return missing
}

/** Every non-empty text across selectors, joined with ", ". */
export const selectAllText = (query: TextQuery, ...selectors: string[]): FieldValue => {
  const texts = selectors.flatMap((selector) => query(selector)).filter((value) => value.length > 0)
  return texts.length > 0 ? present(texts.join(", ")) : missing
}

/** Text of the n-th (0-based) node matching a selector. */
export const selectNth = (query: TextQuery, selector: string, index: number): FieldValue =>
  fromText(query(selector).at(index))

export interface FieldsBuilder {
  set(name: string, value: FieldValue): FieldsBuilder
  /** Sets the field only when no present value is already recorded under that name. */
  setIfMissing(name: string, value: FieldValue): FieldsBuilder
  get(name: string): FieldValue
  build(): ExtractedFields
}

/**
 * Ordered field collection. Re-setting a name replaces its value and keeps
 * its original position.
 */
export const fieldsBuilder = (): FieldsBuilder => {
  const fields = new Map<string, FieldValue>()
  const builder: FieldsBuilder = {
    set(name, value) {
      fields.set(name, value)
      return builder
    },
    setIfMissing(name, value) {
      if (fields.get(name)?.kind !== "present") {
        fields.set(name, value)
      }
      return builder
    },
    get(name) {
      return fields.get(name) ?? missing
    },
    build() {
      return [...fields.entries()]
    },
  }
  return builder
}
