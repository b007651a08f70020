import { ValueTransformer } from 'typeorm';

// Postgres returns bigint columns as strings
export const countTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) => (value === null ? 0 : Number(value)),
};
