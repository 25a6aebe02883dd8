import { readFile } from "fs/promises";
import { z } from "zod";

const seedSchema = z.object({
  categories: z.array(
    z.object({
      name: z.string().min(1),
      description: z.string().default(""),
      imageUrl: z.string().url().nullable().default(null)
    })
  ),
  subcategories: z
    .array(
      z.object({
        category: z.string(),
        name: z.string().min(1),
        description: z.string().default("")
      })
    )
    .default([]),
  fitTypes: z.array(z.object({ name: z.string().min(1), description: z.string().default("") })).default([]),
  brands: z.array(z.object({ name: z.string().min(1) })),
  sliders: z.array(
    z.object({
      imageUrl: z.string().url(),
      altText: z.string(),
      heading: z.string(),
      subheading: z.string().default(""),
      buttonText: z.string(),
      buttonUrl: z.string()
    })
  ),
  products: z.array(
    z.object({
      name: z.string().min(1),
      category: z.string(),
      subcategory: z.string().optional(),
      fitType: z.string().optional(),
      brand: z.string().optional(),
      description: z.string(),
      shortDescription: z.string().default(""),
      price: z.number().positive(),
      salePrice: z.number().positive().optional(),
      isFeatured: z.boolean().default(false),
      isNewArrival: z.boolean().default(false),
      isBestSeller: z.boolean().default(false),
      images: z.array(
        z.object({
          url: z.string().url(),
          altText: z.string().default(""),
          isMain: z.boolean().default(false),
          isHover: z.boolean().default(false),
          order: z.number().int().default(0)
        })
      ),
      variants: z.array(
        z.object({
          color: z.string(),
          size: z.string(),
          stock: z.number().int().min(0),
          priceAdjustment: z.number().default(0)
        })
      )
    })
  )
});

export type SeedData = z.infer<typeof seedSchema>;

export async function loadSeedData(fileUrl = new URL("./seed.json", import.meta.url)): Promise<SeedData> {
  const raw: unknown = JSON.parse(await readFile(fileUrl, "utf8"));
  return seedSchema.parse(raw);
}
