import { Schema, model, type InferSchemaType } from "mongoose";

const cartLineSchema = new Schema(
  {
    productId: { type: Schema.Types.ObjectId, ref: "Product", required: true },
    variantId: { type: Schema.Types.ObjectId, required: true },
    quantity: { type: Number, required: true, min: 1 },
    addedAt: { type: Date, default: Date.now }
  },
  { _id: true }
);

const cartSchema = new Schema(
  {
    userId: { type: String, default: null, index: true },
    sessionId: { type: String, default: null, index: true },
    lines: { type: [cartLineSchema], default: [] }
  },
  { timestamps: true }
);

cartSchema.index({ userId: 1 }, { unique: true, partialFilterExpression: { userId: { $type: "string" } } });
cartSchema.index({ sessionId: 1 }, { unique: true, partialFilterExpression: { sessionId: { $type: "string" } } });

export type CartDocument = InferSchemaType<typeof cartSchema>;
export const CartModel = model("Cart", cartSchema);
