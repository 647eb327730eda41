import { Injectable, Logger } from "@nestjs/common";
import { initTRPC, TRPCError } from "@trpc/server";
import { z } from "zod";

import { ConfigurationError, describeError, InvalidRequestError, type TableRow } from "@voltcast/domain";
import type { PredictorService } from "../predictors/predictor.service";

export interface TrpcContext {
  predictorService: PredictorService;
}

export interface PredictorTableResponse {
  generated_at: string;
  columns: string[];
  rows: TableRow[];
}

const t = initTRPC.context<TrpcContext>().create();

const assembleInputSchema = z.object({
  start: z.string().min(1),
  end: z.string().min(1),
  resolution: z.string().min(1).optional(),
  location: z.union([z.string(), z.tuple([z.number(), z.number()])]).optional(),
  groups: z.array(z.string()).optional(),
});

const logger = new Logger("TrpcRouter");

const appRouter = t.router({
  health: t.procedure.query(() => ({status: "ok" as const})),
  predictors: t.router({
    assemble: t.procedure.input(assembleInputSchema).query(async ({ctx, input}): Promise<PredictorTableResponse> => {
      try {
        const table = await ctx.predictorService.assemble(input);
        return {generated_at: new Date().toISOString(), columns: table.columns, rows: table.toRows()};
      } catch (error) {
        if (error instanceof InvalidRequestError || error instanceof ConfigurationError) {
          throw new TRPCError({code: "BAD_REQUEST", message: error.message, cause: error});
        }
        logger.error(`predictors.assemble failed: ${describeError(error)}`);
        throw error;
      }
    }),
  }),
});

export type AppRouter = typeof appRouter;

@Injectable()
export class TrpcRouter {
  readonly router: AppRouter = appRouter;

  listProcedures(): { path: string; type: "query" | "mutation" }[] {
    return [
      {path: "health", type: "query"},
      {path: "predictors.assemble", type: "query"},
    ];
  }
}
