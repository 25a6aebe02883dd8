import { ORDER_STATUSES, PAYMENT_STATUSES } from "../models/order.js";
import type { OrderStatus, PaymentStatus } from "../views/viewModels.js";

const STATUS_LABELS: Record<OrderStatus, string> = {
  pending: "Pending",
  processing: "Processing",
  shipped: "Shipped",
  delivered: "Delivered",
  cancelled: "Cancelled",
  refunded: "Refunded"
};

const STATUS_BADGES: Record<OrderStatus, string> = {
  pending: "bg-warning text-dark",
  processing: "bg-info text-dark",
  shipped: "bg-primary",
  delivered: "bg-success",
  cancelled: "bg-secondary",
  refunded: "bg-dark"
};

const PAYMENT_LABELS: Record<PaymentStatus, string> = {
  pending: "Awaiting payment",
  paid: "Paid",
  failed: "Payment failed",
  refunded: "Refunded"
};

export function toOrderStatus(value: unknown): OrderStatus {
  return ORDER_STATUSES.find((status) => status === value) ?? "pending";
}

export function toPaymentStatus(value: unknown): PaymentStatus {
  return PAYMENT_STATUSES.find((status) => status === value) ?? "pending";
}

export function orderStatusLabel(status: OrderStatus) {
  return STATUS_LABELS[status];
}

export function orderStatusBadge(status: OrderStatus) {
  return STATUS_BADGES[status];
}

export function paymentStatusLabel(status: PaymentStatus) {
  return PAYMENT_LABELS[status];
}
