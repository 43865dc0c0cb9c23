import { parseArgs } from "node:util";
import { z } from "zod";

const argsSchema = z.object({
  topic: z.string().trim().min(1, "--topic is required"),
  queries: z.array(z.string().trim().min(1)).min(1, "at least one --query is required"),
  perQuery: z.number().int().min(1).max(50),
});
export type FindArgs = z.infer<typeof argsSchema>;

/** `--topic <t> --query <q> [--query <q> ...] [--per-query <n>]` */
export function parseFindArgs(argv: string[], defaultPerQuery: number): FindArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      topic: { type: "string" },
      query: { type: "string", multiple: true },
      "per-query": { type: "string" },
    },
    strict: true,
  });
  const rawPer = values["per-query"];
  return argsSchema.parse({
    topic: values.topic ?? "",
    queries: values.query ?? [],
    perQuery: rawPer === undefined ? defaultPerQuery : Number(rawPer),
  });
}
