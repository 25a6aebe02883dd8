import { OrderModel } from "../models/order.js";
import { toOrderStatus, toPaymentStatus } from "../utils/orderStatus.js";
import { paginate } from "../utils/pagination.js";
import type { OrderHistory } from "../views/viewModels.js";

export async function listOrders(userId: string, page: number, pageSize: number): Promise<OrderHistory> {
  const totalItems = await OrderModel.countDocuments({ userId });
  const pagination = paginate(totalItems, page, pageSize);
  const orders = await OrderModel.find({ userId })
    .sort({ createdAt: -1 })
    .skip(pagination.offset)
    .limit(pageSize)
    .lean();

  return {
    orders: orders.map((order) => ({
      id: order._id.toString(),
      orderNumber: order.orderNumber,
      createdAt: order.createdAt,
      grandTotal: order.grandTotal,
      status: toOrderStatus(order.status),
      paymentStatus: toPaymentStatus(order.paymentStatus),
      itemCount: order.lines.reduce((acc, line) => acc + line.quantity, 0)
    })),
    pagination
  };
}
