import { Schema, model, type InferSchemaType } from "mongoose";
import { isSalePrice } from "../utils/pricing.js";
import { buildSku, slugify } from "../utils/slug.js";

const categorySchema = new Schema(
  {
    name: { type: String, required: true, unique: true, trim: true },
    slug: { type: String, required: true, unique: true },
    description: { type: String, default: "" },
    imageUrl: { type: String, default: null },
    active: { type: Boolean, default: true }
  },
  { timestamps: true }
);

categorySchema.pre("validate", function () {
  if (!this.slug && this.name) {
    this.slug = slugify(this.name);
  }
});

const subCategorySchema = new Schema(
  {
    categoryId: { type: Schema.Types.ObjectId, ref: "Category", required: true },
    name: { type: String, required: true, trim: true },
    slug: { type: String, required: true },
    description: { type: String, default: "" },
    imageUrl: { type: String, default: null },
    active: { type: Boolean, default: true }
  },
  { timestamps: true }
);

subCategorySchema.index({ categoryId: 1, slug: 1 }, { unique: true });

subCategorySchema.pre("validate", function () {
  if (!this.slug && this.name) {
    this.slug = slugify(this.name);
  }
});

const fitTypeSchema = new Schema(
  {
    name: { type: String, required: true, unique: true, trim: true },
    slug: { type: String, required: true, unique: true },
    description: { type: String, default: "" },
    active: { type: Boolean, default: true }
  },
  { timestamps: true }
);

fitTypeSchema.pre("validate", function () {
  if (!this.slug && this.name) {
    this.slug = slugify(this.name);
  }
});

const brandSchema = new Schema(
  {
    name: { type: String, required: true, unique: true, trim: true },
    slug: { type: String, required: true, unique: true },
    active: { type: Boolean, default: true }
  },
  { timestamps: true }
);

brandSchema.pre("validate", function () {
  if (!this.slug && this.name) {
    this.slug = slugify(this.name);
  }
});

const variantSchema = new Schema(
  {
    sku: { type: String, default: "" },
    color: { type: String, required: true },
    size: { type: String, required: true },
    stock: { type: Number, required: true, min: 0, default: 0 },
    priceAdjustment: { type: Number, default: 0 },
    available: { type: Boolean, default: true }
  },
  { _id: true }
);

const imageSchema = new Schema(
  {
    url: { type: String, required: true },
    altText: { type: String, default: "" },
    isMain: { type: Boolean, default: false },
    isHover: { type: Boolean, default: false },
    order: { type: Number, default: 0 }
  },
  { _id: false }
);

const productSchema = new Schema(
  {
    categoryId: { type: Schema.Types.ObjectId, ref: "Category", required: true, index: true },
    subcategoryId: { type: Schema.Types.ObjectId, ref: "SubCategory", default: null, index: true },
    fitTypeId: { type: Schema.Types.ObjectId, ref: "FitType", default: null },
    brandId: { type: Schema.Types.ObjectId, ref: "Brand", default: null, index: true },
    slug: { type: String, required: true, unique: true },
    name: { type: String, required: true, trim: true },
    description: { type: String, required: true },
    shortDescription: { type: String, default: "" },
    price: { type: Number, required: true, min: 0.01 },
    salePrice: { type: Number, default: null, min: 0.01 },
    isOnSale: { type: Boolean, default: false },
    isFeatured: { type: Boolean, default: false },
    isNewArrival: { type: Boolean, default: false },
    isBestSeller: { type: Boolean, default: false },
    active: { type: Boolean, default: true },
    available: { type: Boolean, default: true },
    images: { type: [imageSchema], default: [] },
    variants: { type: [variantSchema], default: [] }
  },
  { timestamps: true }
);

productSchema.index({ active: 1, available: 1 });
productSchema.index({ categoryId: 1, active: 1, available: 1, price: 1 });

productSchema.pre("validate", function () {
  if (!this.slug && this.name) {
    this.slug = slugify(this.name);
  }
  this.isOnSale = isSalePrice(this.price, this.salePrice);
  for (const variant of this.variants) {
    if (!variant.sku) {
      variant.sku = buildSku(this.slug, variant.color, variant.size);
    }
  }
});

export type CategoryDocument = InferSchemaType<typeof categorySchema>;
export type SubCategoryDocument = InferSchemaType<typeof subCategorySchema>;
export type FitTypeDocument = InferSchemaType<typeof fitTypeSchema>;
export type BrandDocument = InferSchemaType<typeof brandSchema>;
export type ProductDocument = InferSchemaType<typeof productSchema>;
export const CategoryModel = model("Category", categorySchema);
export const SubCategoryModel = model("SubCategory", subCategorySchema);
export const FitTypeModel = model("FitType", fitTypeSchema);
export const BrandModel = model("Brand", brandSchema);
export const ProductModel = model("Product", productSchema);
