import dotenv from "dotenv";

dotenv.config();

const parseNumber = (value: string | undefined, fallback: number) => {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseString = (value: string | undefined, fallback: string) => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
};

export type Settings = {
  port: number;
  framework: string;
  perPage: number;
  databaseUrl: string | null;
};

export const settings: Settings = {
  port: parseNumber(process.env.PORT, 4000),
  framework: parseString(process.env.CRUD_FRAMEWORK, "bootstrap"),
  perPage: parseNumber(process.env.CRUD_PER_PAGE, 25),
  databaseUrl: process.env.DATABASE_URL?.trim() || null
};
