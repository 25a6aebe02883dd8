import type { Types } from "mongoose";
import { loadSeedData } from "../data/seedData.js";
import { connectDatabase, disconnectDatabase } from "../db/connect.js";
import { BrandModel, CategoryModel, FitTypeModel, ProductModel, SubCategoryModel } from "../models/catalog.js";
import { HomeSliderModel } from "../models/homeSlider.js";
import { getSiteSettings } from "../services/settings.js";
import { logger } from "../utils/logger.js";

async function seed() {
  const data = await loadSeedData();
  await connectDatabase();

  await Promise.all([
    ProductModel.deleteMany({}),
    CategoryModel.deleteMany({}),
    SubCategoryModel.deleteMany({}),
    FitTypeModel.deleteMany({}),
    BrandModel.deleteMany({}),
    HomeSliderModel.deleteMany({})
  ]);

  const categories = await CategoryModel.create(data.categories);
  const brands = await BrandModel.create(data.brands);
  const fitTypes = await FitTypeModel.create(data.fitTypes);
  const categoryIds = new Map(categories.map((category) => [category.name, category._id]));
  const brandIds = new Map(brands.map((brand) => [brand.name, brand._id]));
  const fitTypeIds = new Map(fitTypes.map((fitType) => [fitType.name, fitType._id]));

  const subcategoryIds = new Map<string, Types.ObjectId>();
  for (const subcategory of data.subcategories) {
    const categoryId = categoryIds.get(subcategory.category);
    if (!categoryId) {
      throw new Error(`Unknown category "${subcategory.category}" for subcategory ${subcategory.name}`);
    }
    const created = await SubCategoryModel.create({ ...subcategory, slug: "", categoryId });
    subcategoryIds.set(`${subcategory.category}/${subcategory.name}`, created._id);
  }

  for (const product of data.products) {
    const categoryId = categoryIds.get(product.category);
    if (!categoryId) {
      throw new Error(`Unknown category "${product.category}" for ${product.name}`);
    }
    await ProductModel.create({
      ...product,
      slug: "",
      categoryId,
      subcategoryId: product.subcategory
        ? (subcategoryIds.get(`${product.category}/${product.subcategory}`) ?? null)
        : null,
      fitTypeId: product.fitType ? (fitTypeIds.get(product.fitType) ?? null) : null,
      brandId: product.brand ? (brandIds.get(product.brand) ?? null) : null,
      salePrice: product.salePrice ?? null
    });
  }

  await HomeSliderModel.create(data.sliders.map((slider, order) => ({ ...slider, order })));
  await getSiteSettings();

  logger.info("seed complete", {
    categories: categories.length,
    subcategories: data.subcategories.length,
    fitTypes: fitTypes.length,
    brands: brands.length,
    products: data.products.length,
    sliders: data.sliders.length
  });
}

seed()
  .catch((error: unknown) => {
    logger.error("seed failed", { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = 1;
  })
  .finally(async () => {
    await disconnectDatabase();
  });
