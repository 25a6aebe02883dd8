import { CSRF_FIELD } from "../../middleware/csrf.js";
import { formatMoney } from "../../utils/pricing.js";
import EmptyState from "../components/EmptyState.js";
import Layout from "../components/Layout.js";
import type { CartView, LayoutContext } from "../viewModels.js";

type CartPageProps = {
  context: LayoutContext;
  cart: CartView;
  csrfToken: string;
};

export default function CartPage({ context, cart, csrfToken }: CartPageProps) {
  const money = (amount: number) => formatMoney(amount, context.currency);
  const { totals } = cart;

  return (
    <Layout title="Cart" context={context}>
      <h1 className="h3 mb-4">Cart</h1>
      {cart.lines.length === 0 ? (
        <EmptyState message="Your cart is empty." />
      ) : (
        <div className="row g-4">
          <div className="col-lg-8">
            <table className="table align-middle cart-table">
              <thead>
                <tr>
                  <th scope="col">Product</th>
                  <th scope="col">Price</th>
                  <th scope="col">Quantity</th>
                  <th scope="col">Total</th>
                  <th scope="col">
                    <span className="visually-hidden">Remove</span>
                  </th>
                </tr>
              </thead>
              <tbody>
                {cart.lines.map((line) => (
                  <tr key={line.id} data-cart-line={line.id}>
                    <td>
                      <div className="d-flex align-items-center gap-3">
                        {line.image ? <img className="cart-thumb" src={line.image.url} alt={line.image.alt} /> : null}
                        <div>
                          <a href={line.url}>{line.name}</a>
                          <div className="text-muted small">{`${line.color} / ${line.size}`}</div>
                        </div>
                      </div>
                    </td>
                    <td>{money(line.unitPrice)}</td>
                    <td>
                      <form method="post" action={`/cart/lines/${line.id}`} className="d-flex gap-2">
                        <input type="hidden" name={CSRF_FIELD} value={csrfToken} />
                        <input
                          className="form-control form-control-sm cart-quantity"
                          type="number"
                          name="quantity"
                          min="0"
                          max="20"
                          defaultValue={line.quantity}
                          aria-label={`Quantity for ${line.name}`}
                        />
                        <button className="btn btn-sm btn-outline-dark" type="submit">
                          Update
                        </button>
                      </form>
                    </td>
                    <td>{money(line.lineTotal)}</td>
                    <td>
                      <form method="post" action={`/cart/lines/${line.id}/remove`}>
                        <input type="hidden" name={CSRF_FIELD} value={csrfToken} />
                        <button className="btn btn-sm btn-link text-danger" type="submit" aria-label={`Remove ${line.name}`}>
                          <i className="bi bi-trash" />
                        </button>
                      </form>
                    </td>
                  </tr>
                ))}
              </tbody>
            </table>
          </div>

          <aside className="col-lg-4">
            <div className="card cart-summary">
              <div className="card-body">
                <form method="get" action="/cart" className="mb-3">
                  <label className="form-label" htmlFor="shipping-zone">
                    Shipping to
                  </label>
                  <div className="d-flex gap-2">
                    <select className="form-select" id="shipping-zone" name="zone" defaultValue={cart.zone ?? ""}>
                      <option value="">Not sure yet</option>
                      <option value="local">Local</option>
                      <option value="remote">Remote</option>
                    </select>
                    <button className="btn btn-outline-dark" type="submit">
                      Update
                    </button>
                  </div>
                </form>
                <dl className="row mb-0">
                  <dt className="col-6">{`Items (${totals.totalItems})`}</dt>
                  <dd className="col-6 text-end" data-cart-subtotal="">
                    {money(totals.subtotal)}
                  </dd>
                  <dt className="col-6">Shipping</dt>
                  <dd className="col-6 text-end" data-cart-shipping="">
                    {totals.shippingCost > 0 ? money(totals.shippingCost) : totals.shippingMessage}
                  </dd>
                  {totals.shippingCost > 0 && totals.shippingMessage ? (
                    <dd className="col-12 text-end text-muted small">{totals.shippingMessage}</dd>
                  ) : null}
                  <dt className="col-6 fs-5">Total</dt>
                  <dd className="col-6 text-end fs-5" data-cart-total="">
                    {money(totals.grandTotal)}
                  </dd>
                </dl>
              </div>
            </div>
          </aside>
        </div>
      )}
    </Layout>
  );
}
