import { formatMoney } from "../../utils/pricing.js";
import Layout from "../components/Layout.js";
import ProductGrid from "../components/ProductGrid.js";
import type { LayoutContext, ProductDetail } from "../viewModels.js";

export default function ProductPage({ context, detail }: { context: LayoutContext; detail: ProductDetail }) {
  const { card } = detail;
  const wishlisted = context.wishlistedIds.has(card.id);
  const purchasable = detail.variants.filter((variant) => variant.stock > 0);

  return (
    <Layout title={card.name} context={context}>
      <nav aria-label="breadcrumb">
        <ol className="breadcrumb">
          <li className="breadcrumb-item">
            <a href="/">Home</a>
          </li>
          {detail.category ? (
            <li className="breadcrumb-item">
              <a href={detail.category.url}>{detail.category.name}</a>
            </li>
          ) : null}
          <li className="breadcrumb-item active" aria-current="page">
            {card.name}
          </li>
        </ol>
      </nav>

      <div className="row g-5" data-product-form="" data-product-id={card.id}>
        <div className="col-md-6 product-gallery">
          {detail.images.map((image, index) => (
            <img key={image.url} className="img-fluid mb-3" src={image.url} alt={image.alt} loading={index === 0 ? "eager" : "lazy"} />
          ))}
        </div>

        <div className="col-md-6">
          {detail.brandName ? <p className="text-uppercase text-muted small mb-1">{detail.brandName}</p> : null}
          <h1 className="h3">{card.name}</h1>
          <div className="product-card__price fs-4 mb-3">
            {card.salePrice !== null ? (
              <>
                <span className="price-current text-danger">{formatMoney(card.salePrice, context.currency)}</span>
                <del className="price-original text-muted ms-2">{formatMoney(card.price, context.currency)}</del>
                <span className="badge bg-danger ms-2">{`-${card.discountPercentage}%`}</span>
              </>
            ) : (
              <span className="price-current">{formatMoney(card.price, context.currency)}</span>
            )}
          </div>
          {detail.shortDescription ? <p className="lead">{detail.shortDescription}</p> : null}

          {purchasable.length > 0 ? (
            <>
              <label className="form-label" htmlFor="variant-select">
                Option
              </label>
              <select className="form-select mb-3" id="variant-select" name="variant_id" data-variant-select="">
                {purchasable.map((variant) => (
                  <option key={variant.id} value={variant.id}>
                    {`${variant.color} / ${variant.size} - ${formatMoney(variant.price, context.currency)}`}
                  </option>
                ))}
              </select>
              <label className="form-label" htmlFor="quantity-input">
                Quantity
              </label>
              <input
                className="form-control mb-3"
                id="quantity-input"
                type="number"
                min="1"
                max="20"
                defaultValue="1"
                data-quantity-input=""
              />
            </>
          ) : null}

          <div className="d-flex gap-2">
            <button
              type="button"
              className="btn btn-dark flex-grow-1"
              data-add-to-cart=""
              data-product-id={card.id}
              data-quantity="1"
              disabled={!card.inStock}
            >
              {card.inStock ? "Add to cart" : "Out of stock"}
            </button>
            <button
              type="button"
              className="btn btn-outline-dark"
              data-wishlist-toggle=""
              data-product-id={card.id}
              aria-pressed={wishlisted}
              aria-label={wishlisted ? "Remove from wishlist" : "Add to wishlist"}
            >
              <i className={wishlisted ? "bi bi-heart-fill" : "bi bi-heart"} />
            </button>
          </div>

          {detail.colors.length > 0 ? <p className="mt-3 mb-1 small">{`Colours: ${detail.colors.join(", ")}`}</p> : null}
          {detail.sizes.length > 0 ? <p className="small">{`Sizes: ${detail.sizes.join(", ")}`}</p> : null}

          <div className="product-description mt-4">{detail.description}</div>
        </div>
      </div>

      {detail.related.length > 0 ? (
        <section className="mt-5" aria-labelledby="related-heading">
          <h2 id="related-heading" className="h4 mb-3">
            You may also like
          </h2>
          <ProductGrid products={detail.related} context={context} />
        </section>
      ) : null}
    </Layout>
  );
}
