// src/utils/money.ts

// Amounts are kept to whole cents; sums of doubles drift otherwise
export const roundMoney = (value: number) => Math.round(value * 100) / 100;
