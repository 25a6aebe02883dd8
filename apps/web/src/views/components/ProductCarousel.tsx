import type { LayoutContext, ProductCard as ProductCardView } from "../viewModels.js";
import ProductCard from "./ProductCard.js";

type ProductCarouselProps = {
  id: string;
  title: string;
  products: ProductCardView[];
  context: LayoutContext;
};

export default function ProductCarousel({ id, title, products, context }: ProductCarouselProps) {
  const headingId = `${id}-heading`;

  return (
    <section className="home-section mb-5" id={id} aria-labelledby={headingId}>
      <h2 id={headingId} className="h4 mb-3">
        {title}
      </h2>
      <div className="swiper" data-carousel="products">
        <div className="swiper-wrapper">
          {products.map((product) => (
            <div className="swiper-slide" key={product.id}>
              <ProductCard
                product={product}
                wishlisted={context.wishlistedIds.has(product.id)}
                currency={context.currency}
              />
            </div>
          ))}
        </div>
        <div className="swiper-button-prev" />
        <div className="swiper-button-next" />
      </div>
    </section>
  );
}
