export const POWER_LOG_MODEL = "mid-journey";

export type PowerLogType = "recharge" | "consume" | "refund" | "invite" | "reward";
export type PowerMark = "add" | "sub";

export type PowerLog = {
  userId: number;
  username: string;
  type: PowerLogType;
  amount: number;
  balance: number;      // balance after the movement
  mark: PowerMark;
  model: string;
  remark: string;
  createdAt: Date;
};

export type UserBalance = {
  id: number;
  username: string;
  power: number;
};

export const refundRemark = (taskId: string): string =>
  `Drawing task failed, power refunded. Task ID: ${taskId}`;
