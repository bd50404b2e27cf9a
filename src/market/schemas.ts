import { z } from 'zod';

const numeric = z.string().trim().min(1).transform(Number).pipe(z.number().finite());

/** [startTime, open, high, low, close, volume, turnover] */
export const klineRowSchema = z.tuple([numeric, numeric, numeric, numeric, numeric, numeric, numeric]);

export const klineResponseSchema = z.object({
  retCode: z.number(),
  retMsg: z.string(),
  result: z
    .object({
      symbol: z.string().optional(),
      category: z.string().optional(),
      list: z.array(klineRowSchema).optional(),
    })
    .optional(),
});

export type KlineResponse = z.infer<typeof klineResponseSchema>;
