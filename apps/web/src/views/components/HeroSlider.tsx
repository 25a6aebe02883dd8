import type { SliderView } from "../viewModels.js";

export default function HeroSlider({ sliders }: { sliders: SliderView[] }) {
  return (
    <section className="hero-slider mb-5" aria-label="Highlights">
      <div className="swiper" data-carousel="hero">
        <div className="swiper-wrapper">
          {sliders.map((slide) => (
            <div className="swiper-slide hero-slide" key={slide.id}>
              <img className="hero-slide__image" src={slide.imageUrl} alt={slide.altText || slide.heading} />
              <div className="hero-slide__caption">
                {slide.heading ? <h2 className="display-6 fw-bold">{slide.heading}</h2> : null}
                {slide.subheading ? <p className="lead">{slide.subheading}</p> : null}
                {slide.buttonText && slide.buttonUrl ? (
                  <a className="btn btn-light btn-lg" href={slide.buttonUrl}>
                    {slide.buttonText}
                  </a>
                ) : null}
              </div>
            </div>
          ))}
        </div>
        <div className="swiper-pagination" />
        <div className="swiper-button-prev" />
        <div className="swiper-button-next" />
      </div>
    </section>
  );
}
