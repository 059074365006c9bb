import { z } from 'zod';

export const ArrayResultSchema = z.array(z.string());

export const ObjectResultSchema = z.record(z.string());

export const StringResultSchema = z.string();
