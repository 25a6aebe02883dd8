import { listingQueryString, SORT_KEYS, SORT_LABELS } from "../../utils/listingFilters.js";
import { formatMoney } from "../../utils/pricing.js";
import EmptyState from "../components/EmptyState.js";
import Layout from "../components/Layout.js";
import Pagination from "../components/Pagination.js";
import ProductGrid from "../components/ProductGrid.js";
import type { CategoryListing, FilterOption, LayoutContext } from "../viewModels.js";

type SelectFilterProps = {
  id: string;
  name: string;
  label: string;
  emptyLabel: string;
  value: string | undefined;
  options: FilterOption[];
};

function SelectFilter({ id, name, label, emptyLabel, value, options }: SelectFilterProps) {
  if (options.length === 0) {
    return null;
  }
  return (
    <>
      <label className="form-label" htmlFor={id}>
        {label}
      </label>
      <select className="form-select mb-3" id={id} name={name} defaultValue={value ?? ""}>
        <option value="">{emptyLabel}</option>
        {options.map((option) => (
          <option key={option.slug} value={option.slug}>
            {option.name}
          </option>
        ))}
      </select>
    </>
  );
}

function asOptions(values: string[]): FilterOption[] {
  return values.map((value) => ({ name: value, slug: value }));
}

function SubcategoryNav({ listing }: { listing: CategoryListing }) {
  const { category, subcategory, subcategories } = listing;
  if (subcategories.length === 0) {
    return null;
  }

  return (
    <nav className="list-group mb-4 subcategory-nav" aria-label={`${category.name} subcategories`}>
      <a
        className={subcategory ? "list-group-item list-group-item-action" : "list-group-item list-group-item-action active"}
        href={category.url}
      >
        {`All ${category.name}`}
      </a>
      {subcategories.map((item) => (
        <a
          key={item.id}
          className={
            subcategory?.id === item.id
              ? "list-group-item list-group-item-action active"
              : "list-group-item list-group-item-action"
          }
          aria-current={subcategory?.id === item.id ? "page" : undefined}
          href={item.url}
        >
          {item.name}
        </a>
      ))}
    </nav>
  );
}

export default function CategoryPage({ context, listing }: { context: LayoutContext; listing: CategoryListing }) {
  const { category, subcategory, filters, pagination, priceRange } = listing;
  const heading = subcategory ?? category;

  return (
    <Layout title={heading.name} context={context}>
      <header className="mb-4">
        {subcategory ? (
          <nav aria-label="breadcrumb">
            <ol className="breadcrumb small mb-1">
              <li className="breadcrumb-item">
                <a href={category.url}>{category.name}</a>
              </li>
              <li className="breadcrumb-item active" aria-current="page">
                {subcategory.name}
              </li>
            </ol>
          </nav>
        ) : null}
        <h1 className="h3">{heading.name}</h1>
        {heading.description ? <p className="text-muted">{heading.description}</p> : null}
      </header>

      <div className="row g-4">
        <aside className="col-lg-3">
          <SubcategoryNav listing={listing} />

          <form className="listing-filters" method="get" action={listing.url}>
            {subcategory ? null : (
              <SelectFilter
                id="filter-subcategory"
                name="subcategory"
                label="Subcategory"
                emptyLabel="All subcategories"
                value={filters.subcategory}
                options={listing.subcategories.map((item) => ({ name: item.name, slug: item.slug }))}
              />
            )}
            <SelectFilter
              id="filter-fit-type"
              name="fit_type"
              label="Fit"
              emptyLabel="All fits"
              value={filters.fitType}
              options={listing.fitTypes}
            />
            <SelectFilter
              id="filter-brand"
              name="brand"
              label="Brand"
              emptyLabel="All brands"
              value={filters.brand}
              options={listing.brands}
            />
            <SelectFilter
              id="filter-color"
              name="color"
              label="Colour"
              emptyLabel="All colours"
              value={filters.color}
              options={asOptions(listing.colors)}
            />
            <SelectFilter
              id="filter-size"
              name="size"
              label="Size"
              emptyLabel="All sizes"
              value={filters.size}
              options={asOptions(listing.sizes)}
            />

            <div className="row g-2 mb-3">
              <div className="col">
                <input
                  className="form-control"
                  type="number"
                  min="0"
                  step="0.01"
                  name="min_price"
                  aria-label="Minimum price"
                  placeholder={priceRange ? formatMoney(priceRange.min, context.currency) : "Min"}
                  defaultValue={filters.minPrice ?? ""}
                />
              </div>
              <div className="col">
                <input
                  className="form-control"
                  type="number"
                  min="0"
                  step="0.01"
                  name="max_price"
                  aria-label="Maximum price"
                  placeholder={priceRange ? formatMoney(priceRange.max, context.currency) : "Max"}
                  defaultValue={filters.maxPrice ?? ""}
                />
              </div>
            </div>

            <label className="form-label" htmlFor="filter-sort">
              Sort by
            </label>
            <select className="form-select mb-3" id="filter-sort" name="sort" defaultValue={filters.sort}>
              {SORT_KEYS.map((key) => (
                <option key={key} value={key}>
                  {SORT_LABELS[key]}
                </option>
              ))}
            </select>

            <button className="btn btn-dark w-100" type="submit">
              Apply filters
            </button>
          </form>
        </aside>

        <section className="col-lg-9">
          <p className="text-muted small">{`${pagination.totalItems} products`}</p>
          {listing.products.length > 0 ? (
            <ProductGrid products={listing.products} context={context} />
          ) : (
            <EmptyState message="No products match these filters." actionHref={listing.url} actionLabel="Clear filters" />
          )}
          <Pagination pagination={pagination} hrefFor={(page) => `${listing.url}${listingQueryString(filters, page)}`} />
        </section>
      </div>
    </Layout>
  );
}
