import { Schema, model, type InferSchemaType } from "mongoose";

const homeSliderSchema = new Schema(
  {
    imageUrl: { type: String, required: true },
    altText: { type: String, required: true },
    heading: { type: String, required: true },
    subheading: { type: String, default: "" },
    buttonText: { type: String, required: true },
    buttonUrl: { type: String, required: true },
    order: { type: Number, default: 0, min: 0 },
    active: { type: Boolean, default: true }
  },
  { timestamps: true }
);

homeSliderSchema.index({ active: 1, order: 1 });

export type HomeSliderDocument = InferSchemaType<typeof homeSliderSchema>;
export const HomeSliderModel = model("HomeSlider", homeSliderSchema);
