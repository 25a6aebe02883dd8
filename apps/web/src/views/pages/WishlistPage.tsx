import EmptyState from "../components/EmptyState.js";
import Layout from "../components/Layout.js";
import ProductGrid from "../components/ProductGrid.js";
import type { LayoutContext, ProductCard } from "../viewModels.js";

export default function WishlistPage({ context, products }: { context: LayoutContext; products: ProductCard[] }) {
  return (
    <Layout title="Wishlist" context={context}>
      <h1 className="h3 mb-4">Wishlist</h1>
      {products.length > 0 ? (
        <ProductGrid products={products} context={context} />
      ) : (
        <EmptyState message="Your wishlist is empty." />
      )}
    </Layout>
  );
}
