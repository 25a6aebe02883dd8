/** True for MongoDB's E11000 unique index violation. */
export function isDuplicateKeyError(error: unknown) {
  return typeof error === "object" && error !== null && "code" in error && error.code === 11000;
}
