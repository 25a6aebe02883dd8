import type Swiper from "swiper";
import type { SwiperOptions } from "swiper/types";

declare global {
  interface Window {
    Swiper?: typeof Swiper;
  }
}

export const CAROUSEL_KINDS = ["hero", "category", "products"] as const;
export type CarouselKind = (typeof CAROUSEL_KINDS)[number];

export type SwiperConstructor = new (container: HTMLElement, options: SwiperOptions) => unknown;

const BREAKPOINT_WIDTHS = [0, 576, 768, 1200] as const;

function isCarouselKind(value: string | undefined): value is CarouselKind {
  return CAROUSEL_KINDS.some((kind) => kind === value);
}

function responsive(slidesPerView: readonly number[], spaceBetween: number) {
  const breakpoints: Record<string, SwiperOptions> = {};
  BREAKPOINT_WIDTHS.forEach((width, index) => {
    breakpoints[width] = { slidesPerView: slidesPerView[index], spaceBetween };
  });
  return breakpoints;
}

const CATEGORY_SLIDES = [2, 3, 4, 6] as const;
const PRODUCT_SLIDES = [1, 2, 3, 4] as const;

/** Swiper settings per carousel. Looping only kicks in once there are more slides than fit on screen. */
export function carouselOptions(kind: CarouselKind, slideCount: number): SwiperOptions {
  switch (kind) {
    case "hero":
      return {
        slidesPerView: 1,
        loop: slideCount > 1,
        autoplay: { delay: 5000, disableOnInteraction: false },
        effect: "fade",
        fadeEffect: { crossFade: true },
        pagination: { clickable: true },
        navigation: true
      };
    case "category":
      return {
        slidesPerView: CATEGORY_SLIDES[0],
        spaceBetween: 16,
        loop: slideCount > Math.max(...CATEGORY_SLIDES),
        breakpoints: responsive(CATEGORY_SLIDES, 16)
      };
    case "products":
      return {
        slidesPerView: PRODUCT_SLIDES[0],
        spaceBetween: 24,
        loop: slideCount > Math.max(...PRODUCT_SLIDES),
        breakpoints: responsive(PRODUCT_SLIDES, 24),
        navigation: true
      };
  }
}

// Navigation and pagination are bound to the controls inside each container so carousels don't share them.
function bindControls(el: HTMLElement, options: SwiperOptions): SwiperOptions {
  const nextEl = el.querySelector<HTMLElement>(".swiper-button-next");
  const prevEl = el.querySelector<HTMLElement>(".swiper-button-prev");
  const paginationEl = el.querySelector<HTMLElement>(".swiper-pagination");

  return {
    ...options,
    navigation: options.navigation && nextEl && prevEl ? { nextEl, prevEl } : false,
    pagination: options.pagination && paginationEl ? { el: paginationEl, clickable: true } : false
  };
}

export function initCarousels(root: ParentNode = document, SwiperCtor: SwiperConstructor | undefined = window.Swiper) {
  if (!SwiperCtor) {
    console.warn("carousel library not loaded");
    return [];
  }

  const instances: unknown[] = [];
  for (const el of Array.from(root.querySelectorAll<HTMLElement>("[data-carousel]"))) {
    const kind = el.dataset.carousel;
    if (!isCarouselKind(kind)) {
      continue;
    }
    const slideCount = el.querySelectorAll(".swiper-slide").length;
    instances.push(new SwiperCtor(el, bindControls(el, carouselOptions(kind, slideCount))));
  }
  return instances;
}
