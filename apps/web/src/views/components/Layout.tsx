import type { ReactNode } from "react";
import type { LayoutContext } from "../viewModels.js";
import Navbar from "./Navbar.js";

const BOOTSTRAP_CSS = "https://cdn.jsdelivr.net/npm/bootstrap@5.3.3/dist/css/bootstrap.min.css";
const BOOTSTRAP_ICONS_CSS = "https://cdn.jsdelivr.net/npm/bootstrap-icons@1.11.3/font/bootstrap-icons.min.css";

type LayoutProps = {
  title: string;
  context: LayoutContext;
  children: ReactNode;
};

export function pageTitle(title: string) {
  return `${title} | Shopfront`;
}

export default function Layout({ title, context, children }: LayoutProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{pageTitle(title)}</title>
        <link rel="stylesheet" href={BOOTSTRAP_CSS} />
        <link rel="stylesheet" href={BOOTSTRAP_ICONS_CSS} />
        <link rel="stylesheet" href="/vendor/swiper/swiper-bundle.min.css" />
        <link rel="stylesheet" href="/static/css/shopfront.css" />
      </head>
      <body>
        <Navbar context={context} />
        {context.announcement ? (
          <div className="announcement-bar text-center py-2" role="note">
            {context.announcement}
          </div>
        ) : null}
        <div id="toast-container" className="toast-stack" aria-live="polite" />
        <main className="container py-4">{children}</main>
        <footer className="site-footer border-top py-4 mt-5">
          <div className="container text-muted small">{`© ${new Date().getFullYear()} Shopfront`}</div>
        </footer>
        <script src="/vendor/swiper/swiper-bundle.min.js" defer />
        <script type="module" src="/static/js/main.js" />
      </body>
    </html>
  );
}
