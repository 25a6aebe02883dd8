import EmptyState from "../components/EmptyState.js";
import Layout from "../components/Layout.js";
import ProductGrid from "../components/ProductGrid.js";
import type { LayoutContext, ProductCard } from "../viewModels.js";

type SearchPageProps = {
  context: LayoutContext;
  query: string;
  results: ProductCard[];
  minLength: number;
};

export default function SearchPage({ context, query, results, minLength }: SearchPageProps) {
  const term = query.trim();
  const tooShort = term.length < minLength;

  return (
    <Layout title={tooShort ? "Search" : `Search: ${term}`} context={context}>
      <h1 className="h3 mb-4">{tooShort ? "Search" : `Results for "${term}"`}</h1>
      {tooShort ? (
        <p className="text-muted">{`Enter at least ${minLength} characters to search.`}</p>
      ) : results.length > 0 ? (
        <ProductGrid products={results} context={context} />
      ) : (
        <EmptyState message={`No products found for "${term}".`} />
      )}
    </Layout>
  );
}
