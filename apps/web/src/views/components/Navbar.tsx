import type { LayoutContext } from "../viewModels.js";

export function badgeClassName(count: number) {
  return count > 0 ? "badge rounded-pill bg-danger nav-badge" : "badge rounded-pill bg-danger nav-badge d-none";
}

function isWithin(currentPath: string, url: string) {
  return currentPath === url || currentPath.startsWith(`${url}/`);
}

export default function Navbar({ context }: { context: LayoutContext }) {
  return (
    <nav className="navbar navbar-expand-lg bg-white border-bottom sticky-top">
      <div className="container">
        <a className="navbar-brand fw-bold" href="/">
          Shopfront
        </a>

        <ul className="navbar-nav me-auto flex-row flex-wrap gap-3">
          {context.categories.map((category) => (
            <li className="nav-item" key={category.id}>
              <a
                className={isWithin(context.currentPath, category.url) ? "nav-link active" : "nav-link"}
                aria-current={context.currentPath === category.url ? "page" : undefined}
                href={category.url}
              >
                {category.name}
              </a>
            </li>
          ))}
        </ul>

        <form className="d-flex me-3" role="search" action="/search" method="get">
          <input className="form-control" type="search" name="q" placeholder="Search products" aria-label="Search" />
        </form>

        <div className="d-flex align-items-center gap-3">
          <a href="/wishlist" className="nav-icon position-relative" aria-label="Wishlist">
            <i className="bi bi-heart" />
            <span className={badgeClassName(context.wishlistCount)} data-wishlist-count="">
              {context.wishlistCount}
            </span>
          </a>
          <a href="/cart" className="nav-icon position-relative" aria-label="Cart">
            <i className="bi bi-bag" />
            <span className={badgeClassName(context.cartCount)} data-cart-count="">
              {context.cartCount}
            </span>
          </a>
          <a href="/orders" className="nav-link">
            {context.signedIn ? (context.displayName ?? "My orders") : "Orders"}
          </a>
        </div>
      </div>
    </nav>
  );
}
