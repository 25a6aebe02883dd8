export function slugify(value: string) {
  return value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, "")
    .trim()
    .replace(/[\s_-]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

export function buildSku(productSlug: string, color: string, size: string) {
  return `${productSlug}-${color.toLowerCase()}-${size.toLowerCase()}`.replace(/ /g, "-");
}
