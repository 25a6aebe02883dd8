import type { LayoutContext, ProductCard as ProductCardView } from "../viewModels.js";
import ProductCard from "./ProductCard.js";

export default function ProductGrid({ products, context }: { products: ProductCardView[]; context: LayoutContext }) {
  return (
    <div className="row row-cols-1 row-cols-sm-2 row-cols-md-3 row-cols-xl-4 g-4 product-grid">
      {products.map((product) => (
        <div className="col" key={product.id}>
          <ProductCard product={product} wishlisted={context.wishlistedIds.has(product.id)} currency={context.currency} />
        </div>
      ))}
    </div>
  );
}
