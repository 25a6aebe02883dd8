export function escapeRegex(value: string) {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function containsInsensitive(value: string) {
  return { $regex: escapeRegex(value), $options: "i" };
}
