export { enter, exit, isLimitOrder, validateOrder, partitionOrders, type EnterSize } from './order.js';
