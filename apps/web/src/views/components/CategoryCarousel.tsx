import type { CategoryLink } from "../viewModels.js";

export default function CategoryCarousel({ categories }: { categories: CategoryLink[] }) {
  return (
    <section className="home-section mb-5" aria-labelledby="shop-by-category">
      <h2 id="shop-by-category" className="h4 mb-3">
        Shop by Category
      </h2>
      <div className="swiper" data-carousel="category">
        <div className="swiper-wrapper">
          {categories.map((category) => (
            <div className="swiper-slide" key={category.id}>
              <a className="category-tile" href={category.url}>
                {category.imageUrl ? (
                  <img className="category-tile__image" src={category.imageUrl} alt={category.name} loading="lazy" />
                ) : (
                  <span className="category-tile__icon">
                    <i className="bi bi-grid" />
                  </span>
                )}
                <span className="category-tile__name">{category.name}</span>
              </a>
            </div>
          ))}
        </div>
      </div>
    </section>
  );
}
