import { InvalidArgumentError } from "commander";

export const parsePositiveInteger = (value: string): number => {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("expected a positive integer");
  }

  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("expected a positive integer");
  }
  return parsed;
};
