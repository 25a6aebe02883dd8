import { formatMoney } from "../../utils/pricing.js";
import type { ProductCard as ProductCardView } from "../viewModels.js";

type ProductCardProps = {
  product: ProductCardView;
  wishlisted: boolean;
  currency: string;
};

export default function ProductCard({ product, wishlisted, currency }: ProductCardProps) {
  const { mainImage, hoverImage } = product;
  const showHover = hoverImage !== null && hoverImage.url !== mainImage?.url;

  return (
    <article className="product-card card h-100" data-product-id={product.id}>
      <a href={product.url} className="product-card__media">
        {mainImage ? (
          <img className="product-card__image" src={mainImage.url} alt={mainImage.alt} loading="lazy" />
        ) : (
          <span className="product-card__placeholder">
            <i className="bi bi-image" />
          </span>
        )}
        {showHover ? (
          <img
            className="product-card__image product-card__image--hover"
            src={hoverImage.url}
            alt={hoverImage.alt}
            loading="lazy"
          />
        ) : null}
      </a>

      <div className="product-card__badges">
        {product.isOnSale ? <span className="badge bg-danger">{`-${product.discountPercentage}%`}</span> : null}
        {product.isNewArrival ? <span className="badge bg-success">New</span> : null}
        {product.isBestSeller ? <span className="badge bg-warning text-dark">Best Seller</span> : null}
      </div>

      <button
        type="button"
        className="product-card__wishlist btn btn-light btn-sm"
        data-wishlist-toggle=""
        data-product-id={product.id}
        aria-pressed={wishlisted}
        aria-label={wishlisted ? "Remove from wishlist" : "Add to wishlist"}
      >
        <i className={wishlisted ? "bi bi-heart-fill" : "bi bi-heart"} />
      </button>

      <div className="card-body d-flex flex-column">
        <h3 className="product-card__title h6">
          <a href={product.url}>{product.name}</a>
        </h3>
        <div className="product-card__price mb-3">
          {product.salePrice !== null ? (
            <>
              <span className="price-current text-danger">{formatMoney(product.salePrice, currency)}</span>
              <del className="price-original text-muted ms-2">{formatMoney(product.price, currency)}</del>
            </>
          ) : (
            <span className="price-current">{formatMoney(product.price, currency)}</span>
          )}
        </div>
        <button
          type="button"
          className="btn btn-dark w-100 mt-auto"
          data-add-to-cart=""
          data-product-id={product.id}
          data-quantity="1"
          disabled={!product.inStock}
        >
          {product.inStock ? "Add to cart" : "Out of stock"}
        </button>
      </div>
    </article>
  );
}
