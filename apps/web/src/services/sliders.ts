import { HomeSliderModel } from "../models/homeSlider.js";
import type { SliderView } from "../views/viewModels.js";

export async function listActiveSliders(): Promise<SliderView[]> {
  const sliders = await HomeSliderModel.find({ active: true }).sort({ order: 1 }).lean();
  return sliders.map((slider) => ({
    id: slider._id.toString(),
    imageUrl: slider.imageUrl,
    altText: slider.altText,
    heading: slider.heading,
    subheading: slider.subheading,
    buttonText: slider.buttonText,
    buttonUrl: slider.buttonUrl
  }));
}
