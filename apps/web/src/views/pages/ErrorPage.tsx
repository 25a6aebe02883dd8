import Layout from "../components/Layout.js";
import type { LayoutContext } from "../viewModels.js";

const TITLES: Record<number, string> = {
  400: "Bad Request",
  401: "Sign In Required",
  403: "Forbidden",
  404: "Page Not Found",
  409: "Conflict"
};

export function errorTitle(status: number) {
  return TITLES[status] ?? "Something Went Wrong";
}

type ErrorPageProps = {
  context: LayoutContext;
  status: number;
  message: string;
};

export default function ErrorPage({ context, status, message }: ErrorPageProps) {
  return (
    <Layout title={errorTitle(status)} context={context}>
      <div className="error-page text-center py-5">
        <p className="display-4 fw-bold">{status}</p>
        <h1 className="h3">{errorTitle(status)}</h1>
        <p className="text-muted">{message}</p>
        <a className="btn btn-dark" href="/">
          Back to the shop
        </a>
      </div>
    </Layout>
  );
}
