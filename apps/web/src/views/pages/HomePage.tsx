import CategoryCarousel from "../components/CategoryCarousel.js";
import HeroSlider from "../components/HeroSlider.js";
import Layout from "../components/Layout.js";
import ProductCarousel from "../components/ProductCarousel.js";
import type { FeatureFlags, HomeSections, LayoutContext, ProductCard, SliderView } from "../viewModels.js";

type HomePageProps = {
  context: LayoutContext;
  flags: FeatureFlags;
  sliders: SliderView[];
  sections: HomeSections;
};

type SectionConfig = {
  id: string;
  title: string;
  enabled: boolean;
  products: ProductCard[];
};

export default function HomePage({ context, flags, sliders, sections }: HomePageProps) {
  const productSections: SectionConfig[] = [
    { id: "featured", title: "Featured Products", enabled: flags.showFeatured, products: sections.featured },
    { id: "new-arrivals", title: "New Arrivals", enabled: flags.showNewArrivals, products: sections.newArrivals },
    { id: "best-sellers", title: "Best Sellers", enabled: flags.showBestSellers, products: sections.bestSellers },
    { id: "on-sale", title: "On Sale", enabled: flags.showSaleProducts, products: sections.sale }
  ];

  return (
    <Layout title="Home" context={context}>
      {flags.showHomeSlider && sliders.length > 0 ? <HeroSlider sliders={sliders} /> : null}
      {flags.showCategoryCarousel && context.categories.length > 0 ? (
        <CategoryCarousel categories={context.categories} />
      ) : null}
      {productSections
        .filter((section) => section.enabled && section.products.length > 0)
        .map((section) => (
          <ProductCarousel
            key={section.id}
            id={section.id}
            title={section.title}
            products={section.products}
            context={context}
          />
        ))}
    </Layout>
  );
}
