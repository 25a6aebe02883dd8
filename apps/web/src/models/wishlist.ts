import { Schema, model, type InferSchemaType } from "mongoose";

const wishlistItemSchema = new Schema(
  {
    userId: { type: String, default: null, index: true },
    sessionId: { type: String, default: null, index: true },
    productId: { type: Schema.Types.ObjectId, ref: "Product", required: true, index: true }
  },
  { timestamps: true }
);

wishlistItemSchema.index(
  { userId: 1, productId: 1 },
  { unique: true, partialFilterExpression: { userId: { $type: "string" } } }
);
wishlistItemSchema.index(
  { sessionId: 1, productId: 1 },
  { unique: true, partialFilterExpression: { sessionId: { $type: "string" } } }
);

export type WishlistItemDocument = InferSchemaType<typeof wishlistItemSchema>;
export const WishlistItemModel = model("WishlistItem", wishlistItemSchema);
