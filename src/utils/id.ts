// src/utils/id.ts
import { ulid } from "ulid";

/** Sortable primary key for customers, movies and rentals. */
export function newId() {
  return ulid();
}
