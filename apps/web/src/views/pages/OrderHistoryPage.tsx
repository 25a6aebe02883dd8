import { orderStatusBadge, orderStatusLabel, paymentStatusLabel } from "../../utils/orderStatus.js";
import { formatMoney } from "../../utils/pricing.js";
import EmptyState from "../components/EmptyState.js";
import Layout from "../components/Layout.js";
import Pagination from "../components/Pagination.js";
import type { LayoutContext, OrderHistory } from "../viewModels.js";

function formatDate(value: Date) {
  return value.toLocaleDateString("en-US", { year: "numeric", month: "short", day: "numeric" });
}

export default function OrderHistoryPage({ context, history }: { context: LayoutContext; history: OrderHistory }) {
  return (
    <Layout title="Order History" context={context}>
      <h1 className="h3 mb-4">Order History</h1>
      {history.orders.length === 0 ? (
        <EmptyState message="You have not placed any orders yet." />
      ) : (
        <>
          <table className="table align-middle order-table">
            <thead>
              <tr>
                <th scope="col">Order</th>
                <th scope="col">Date</th>
                <th scope="col">Items</th>
                <th scope="col">Total</th>
                <th scope="col">Status</th>
                <th scope="col">Payment</th>
              </tr>
            </thead>
            <tbody>
              {history.orders.map((order) => (
                <tr key={order.id}>
                  <td className="font-monospace">{`#${order.orderNumber}`}</td>
                  <td>{formatDate(order.createdAt)}</td>
                  <td>{order.itemCount}</td>
                  <td>{formatMoney(order.grandTotal, context.currency)}</td>
                  <td>
                    <span className={`badge ${orderStatusBadge(order.status)}`}>{orderStatusLabel(order.status)}</span>
                  </td>
                  <td>{paymentStatusLabel(order.paymentStatus)}</td>
                </tr>
              ))}
            </tbody>
          </table>
          <Pagination pagination={history.pagination} hrefFor={(page) => `/orders?page=${page}`} />
        </>
      )}
    </Layout>
  );
}
