import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { renderReportMarkdown, UnavailableError, createLogger } from "@account-plan/agents";
import type { SessionRegistry } from "@account-plan/agents";
import {
  AskSchema,
  ReportSchema,
  OverviewSchema,
  ResearchSchema,
  EvidenceSchema,
  ClarifySchema,
} from "../schemas/account-plan.js";
import { wrapResponse, toError } from "../formatters/response.js";
import type { ToolResponse } from "../formatters/response.js";

const log = createLogger("mcp-tools");

type Sessions = Pick<SessionRegistry, "get">;

async function run(tool: string, body: () => Promise<unknown>): Promise<ToolResponse> {
  try {
    return wrapResponse(await body());
  } catch (err) {
    const error = toError(err);
    if (error instanceof UnavailableError) {
      log.warn(`${tool}: LLM unavailable`, { attempts: error.attempts.length });
    } else {
      log.error(`${tool} failed`, { error: error.message });
    }
    return wrapResponse(error);
  }
}

/** Tool handlers, independent of the transport so they can be called directly. */
export function createAccountPlanHandlers(sessions: Sessions) {
  return {
    ask: (params: unknown) =>
      run("account_plan_ask", async () => {
        const { company, question, force_refresh } = AskSchema.parse(params);
        return sessions.get(company).ask(question, { forceRefresh: force_refresh });
      }),

    report: (params: unknown) =>
      run("account_plan_report", async () => {
        const { company, directive, format, force_refresh } = ReportSchema.parse(params);
        const report = await sessions.get(company).generateReport(directive, { forceRefresh: force_refresh });
        return format === "markdown" ? renderReportMarkdown(report) : report;
      }),

    overview: (params: unknown) =>
      run("account_plan_overview", async () => {
        const { company, force_refresh } = OverviewSchema.parse(params);
        const summary = await sessions.get(company).refreshOverview({ forceRefresh: force_refresh });
        return { company, summary };
      }),

    research: (params: unknown) =>
      run("account_plan_research", async () => {
        const { company, topics, force_refresh } = ResearchSchema.parse(params);
        return sessions.get(company).deepResearch(topics, { forceRefresh: force_refresh });
      }),

    evidence: (params: unknown) =>
      run("account_plan_evidence", async () => {
        const { company, question } = EvidenceSchema.parse(params);
        return sessions.get(company).evidenceCard(question);
      }),

    clarify: (params: unknown) =>
      run("account_plan_clarify", async () => {
        const { company, directive } = ClarifySchema.parse(params);
        const questions = await sessions.get(company).clarifyingQuestions(directive);
        return { company, questions };
      }),
  };
}

export function registerAccountPlanTools(server: McpServer, sessions: Sessions) {
  const handlers = createAccountPlanHandlers(sessions);

  server.tool(
    "account_plan_ask",
    "Answer a question about a company from its document corpus and web search. Runs the planner, retriever, synthesizer and critic loop. Returns the answer, cited sources, follow-up suggestions and a low-confidence flag.",
    AskSchema.shape,
    async (params) => handlers.ask(params),
  );

  server.tool(
    "account_plan_report",
    "Generate a full account plan: directive response, overview, competitors, market position, financial summary, SWOT, strategy, structured insights, revenue series and top products table. Sections keep a fixed order; each carries a status and its sources.",
    ReportSchema.shape,
    async (params) => handlers.report(params),
  );

  server.tool(
    "account_plan_overview",
    "Refresh the company overview from overview searches (finances, annual report, revenue by year). Cached per company.",
    OverviewSchema.shape,
    async (params) => handlers.overview(params),
  );

  server.tool(
    "account_plan_research",
    "Run timeboxed research over several topics and merge the findings into the company knowledge base used by later questions and reports.",
    ResearchSchema.shape,
    async (params) => handlers.research(params),
  );

  server.tool(
    "account_plan_evidence",
    "Back a claim with evidence from what the company knowledge base already holds (no new searches). Returns a one-line claim, one or two source ids, a short evidence passage and a 0-1 confidence.",
    EvidenceSchema.shape,
    async (params) => handlers.evidence(params),
  );

  server.tool(
    "account_plan_clarify",
    "Suggest two to four clarifying questions to ask the user before deep research or a report. Returns an empty list when none would change the research.",
    ClarifySchema.shape,
    async (params) => handlers.clarify(params),
  );
}
