import type { FastifyInstance } from "fastify";

import { hydrateBlocks } from "../blocks/record_blocks";
import type { DuplicatePolicy } from "../config/overview_config";
import { OverviewRequest } from "../contracts/log_blocks";
import { INCOMPLETE_LOG_GUIDANCE } from "../overview/help_text";
import { isOverviewHardError } from "../overview/overview_errors";
import { assembleOverview } from "../overview/report_assembler";

type OverviewRoutesOptions = {
  duplicatePolicy?: DuplicatePolicy;
};

export async function overviewRoutes(app: FastifyInstance, opts: OverviewRoutesOptions = {}) {
  const duplicatePolicy = opts.duplicatePolicy ?? "first";

  // Explicit OPTIONS handler for predictable CORS preflight behavior.
  app.options("/overview", async (_req, reply) => reply.code(204).send());

  app.post("/overview", async (req, reply) => {
    const parsed = OverviewRequest.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }

    const hydrated = hydrateBlocks(parsed.data.blocks);
    if (!hydrated.ok) {
      req.log.warn({ index: hydrated.index, kind: hydrated.kind }, "overview.block_record_invalid");
      return reply.code(400).send({
        error: "invalid_request",
        details: {
          blockIndex: hydrated.index,
          blockKind: hydrated.kind,
          ...hydrated.error.flatten(),
        },
      });
    }

    try {
      const report = assembleOverview(
        { blocks: hydrated.blocks, comments: parsed.data.comments },
        { duplicatePolicy, log: req.log }
      );
      return reply.code(200).send({ ok: true, report });
    } catch (err) {
      if (isOverviewHardError(err)) {
        req.log.warn({ code: err.code, field: err.field }, "overview.structural_error");
        const body = err.toJSON();
        return reply.code(422).send({
          ...body,
          message: `Error parsing information: ${body.message}. ${INCOMPLETE_LOG_GUIDANCE}`,
        });
      }
      throw err;
    }
  });
}
