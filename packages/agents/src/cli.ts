#!/usr/bin/env node
// Account plan CLI
//
// Usage:
//   account-plan ask -c Nokia "How did revenue change from 2023 to 2024?"
//   account-plan report -c Nokia "compare 2025 vs 2024 revenue" --out plan.md
//   account-plan overview -c Nokia
//   account-plan research -c Nokia --topics "segments,competitors"
//   account-plan evidence -c Nokia "Revenue grew in 2024"
//   account-plan clarify -c Nokia "compare 2025 vs 2024 revenue"
//   account-plan -i -c Nokia                                          # interactive REPL
//   account-plan --help

import 'dotenv/config';
import { createInterface } from 'node:readline';
import type { Interface } from 'node:readline';
import { writeFile } from 'node:fs/promises';
import { loadSettings } from '../config/settings.js';
import { createRuntime, SessionRegistry } from '../orchestrator/runtime.js';
import type { Orchestrator, AskResult } from '../orchestrator/orchestrator.js';
import { UnavailableError } from '../llm/errors.js';
import { renderReportMarkdown } from '../utils/report-markdown.js';
import type { DomainEventType } from '../types/events.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
  magenta: isTTY ? '\x1b[35m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

function describeError(err: unknown): string {
  if (err instanceof UnavailableError) {
    const models = [...new Set(err.attempts.map((a) => a.model))].join(', ');
    return `${err.message}${models ? ` (tried: ${models})` : ''}`;
  }
  return err instanceof Error ? err.message : String(err);
}

// ── Argument parsing ────────────────────────────────────────────────

interface ParsedArgs {
  command?: string;
  company?: string;
  interactive: boolean;
  refresh: boolean;
  verbose: boolean;
  help: boolean;
  out?: string;
  topics?: string[];
  text: string;
}

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = { interactive: false, refresh: false, verbose: false, help: false, text: '' };
  const words: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '-i' || arg === '--interactive') {
      parsed.interactive = true;
    } else if ((arg === '-c' || arg === '--company') && argv[i + 1]) {
      parsed.company = argv[++i];
    } else if (arg === '--refresh') {
      parsed.refresh = true;
    } else if (arg === '-v' || arg === '--verbose') {
      parsed.verbose = true;
    } else if (arg === '--out' && argv[i + 1]) {
      parsed.out = argv[++i];
    } else if (arg === '--topics' && argv[i + 1]) {
      parsed.topics = argv[++i].split(',').map((t) => t.trim()).filter(Boolean);
    } else if (arg === '-h' || arg === '--help') {
      parsed.help = true;
    } else if (!parsed.command && !parsed.interactive && words.length === 0 && !arg.startsWith('-')) {
      parsed.command = arg;
    } else {
      words.push(arg);
    }
  }
  parsed.text = words.join(' ').trim();
  return parsed;
}

// ── CLI class ───────────────────────────────────────────────────────

class AccountPlanCli {
  private sessions: SessionRegistry | null = null;

  async start(): Promise<void> {
    const args = parseArgs(process.argv.slice(2));

    if (args.help || (!args.command && !args.interactive)) {
      this.printHelp();
      return;
    }
    if (args.command === 'help') {
      this.printHelp();
      return;
    }
    if (!args.company) {
      console.error(`  ${c('red', 'Error:')} --company <name> is required.\n`);
      process.exit(1);
    }

    const session = await this.session(args.company, args.verbose);

    if (args.interactive) {
      await this.startRepl(session);
      return;
    }

    switch (args.command) {
      case 'ask':
        await this.runAsk(session, args.text, args.refresh);
        break;
      case 'report':
        await this.runReport(session, args.text, args.refresh, args.out);
        break;
      case 'overview':
        await this.runOverview(session, args.refresh);
        break;
      case 'research':
        await this.runResearch(session, args.topics, args.refresh);
        break;
      case 'evidence':
        await this.runEvidence(session, args.text, args.refresh);
        break;
      case 'clarify':
        await this.runClarify(session, args.text);
        break;
      default:
        console.error(`Unknown command: ${args.command}\n`);
        this.printHelp();
        process.exit(1);
    }
  }

  private async session(company: string, verbose: boolean): Promise<Orchestrator> {
    if (!this.sessions) {
      const settings = loadSettings();
      const runtime = await createRuntime(settings, {
        onEvent: verbose ? (e) => this.printEvent(e.type, e.payload) : undefined,
      });
      this.sessions = new SessionRegistry(runtime);
    }
    return this.sessions.get(company);
  }

  private printEvent(type: DomainEventType, payload: unknown): void {
    process.stderr.write(`  ${c('magenta', `[${type}]`)} ${c('dim', JSON.stringify(payload))}\n`);
  }

  // ── Commands ────────────────────────────────────────────────────

  private async runAsk(session: Orchestrator, question: string, refresh: boolean): Promise<void> {
    if (!question) {
      console.error('Error: No question provided. Use "account-plan --help" for usage.\n');
      process.exit(1);
    }
    const startTime = Date.now();
    const result = await session.ask(question, { forceRefresh: refresh });
    this.printAnswer(result);
    const duration = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`  ${c('green', '✓')} ${c('bold', 'Complete')} ${c('dim', `— ${duration}s | retries: ${result.retries}`)}\n`);
  }

  private async runReport(session: Orchestrator, directive: string, refresh: boolean, out?: string): Promise<void> {
    const startTime = Date.now();
    console.log(`\n  ${c('bold', 'Account Plan')} ${c('dim', `— ${session.company}`)}\n`);

    const report = await session.generateReport(directive, { forceRefresh: refresh });
    const markdown = renderReportMarkdown(report);
    if (out) {
      await writeFile(out, markdown, 'utf-8');
      console.log(`  ${c('green', '✓')} Report written to ${c('cyan', out)}`);
    } else {
      console.log(markdown);
    }

    const duration = ((Date.now() - startTime) / 1000).toFixed(1);
    const flag = report.lowConfidence ? c('yellow', ' | low confidence') : '';
    console.log(`  ${c('green', '✓')} ${c('bold', 'Complete')} ${c('dim', `— ${duration}s | path: ${report.path}`)}${flag}\n`);
  }

  private async runOverview(session: Orchestrator, refresh: boolean): Promise<void> {
    const summary = await session.refreshOverview({ forceRefresh: refresh });
    console.log(`\n${summary}\n`);
  }

  private async runResearch(session: Orchestrator, topics: string[] | undefined, refresh: boolean): Promise<void> {
    const result = await session.deepResearch(topics, { forceRefresh: refresh });
    console.log(`\n  ${c('bold', 'Research')} ${c('dim', `— ${session.company}`)}`);
    console.log(`  Topics: ${result.topicsCompleted.join(', ') || '(none)'}`);
    if (result.topicsSkipped.length > 0) {
      console.log(`  ${c('yellow', 'Skipped (timebox):')} ${result.topicsSkipped.join(', ')}`);
    }
    console.log(`  ${c('dim', `+${result.addedSnippets} snippets, +${result.addedFacts} revenue facts`)}\n`);
  }

  private async runEvidence(session: Orchestrator, question: string, refresh: boolean): Promise<void> {
    if (!question) {
      console.error('Error: No claim or question provided. Use "account-plan --help" for usage.\n');
      process.exit(1);
    }
    // Cards only draw on the knowledge base, so an empty one is researched first
    if (session.snapshot().snippets.length === 0) {
      console.log(`  ${c('dim', 'Knowledge base is empty; researching the question first…')}`);
      await session.deepResearch([question], { forceRefresh: refresh });
    }
    const card = await session.evidenceCard(question);
    console.log(`\n  ${c('bold', 'Claim:')} ${card.claim}`);
    for (const source of card.sources) console.log(`  ${c('bold', 'Source:')} ${c('cyan', source)}`);
    console.log(`  ${c('bold', 'Evidence:')} ${card.evidence}`);
    console.log(`  ${c('bold', 'Confidence:')} ${card.confidence.toFixed(2)}\n`);
  }

  private async runClarify(session: Orchestrator, directive: string): Promise<void> {
    const questions = await session.clarifyingQuestions(directive);
    if (questions.length === 0) {
      console.log(`\n  ${c('dim', 'No clarifying questions; the request is specific enough.')}\n`);
      return;
    }
    console.log(`\n  ${c('bold', 'Before researching:')}`);
    for (const q of questions) console.log(`    ${c('cyan', '?')} ${q}`);
    console.log();
  }

  private printAnswer(result: AskResult): void {
    console.log(`\n${result.answer}\n`);
    if (result.sources.length > 0) {
      console.log(`  ${c('bold', 'Sources:')}`);
      for (const source of result.sources) console.log(`    ${c('dim', source)}`);
    }
    if (result.lowConfidence) console.log(`  ${c('yellow', 'Low confidence:')} the critic did not accept this answer.`);
    for (const warning of result.warnings) console.log(`  ${c('yellow', 'Warning:')} ${warning}`);
    if (result.followups.length > 0) {
      console.log(`  ${c('bold', 'Follow-ups:')}`);
      for (const f of result.followups) console.log(`    ${c('cyan', '›')} ${f}`);
    }
    console.log();
  }

  // ── Interactive REPL ────────────────────────────────────────────

  private async startRepl(session: Orchestrator): Promise<void> {
    console.log(`\n  ${c('bold', 'Account Plan')} ${c('dim', `— ${session.company}`)}`);
    console.log(`  ${c('dim', 'Ask a question, or /help for commands.')}\n`);

    const rl = createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: `${c('cyan', 'plan>')} `,
    });

    rl.prompt();

    rl.on('line', (line: string) => {
      this.handleLine(session, line.trim(), rl)
        .catch((err: unknown) => {
          console.error(`  ${c('red', 'Error:')} ${describeError(err)}\n`);
        })
        .finally(() => rl.prompt());
    });

    rl.on('close', () => {
      console.log(`  ${c('dim', 'Goodbye.')}\n`);
      process.exit(0);
    });

    rl.on('SIGINT', () => rl.close());
  }

  private async handleLine(session: Orchestrator, input: string, rl: Interface): Promise<void> {
    if (!input) return;

    if (input === 'exit' || input === 'quit') {
      rl.close();
      return;
    }
    if (input === '/help') {
      this.printReplHelp();
      return;
    }
    if (input === '/clear') {
      console.clear();
      return;
    }
    if (input === '/overview') {
      await this.runOverview(session, false);
      return;
    }
    if (input === '/research') {
      await this.runResearch(session, undefined, false);
      return;
    }
    if (input === '/kb') {
      const kb = session.snapshot();
      const years = kb.facts.map((f) => f.year).join(', ') || 'none';
      console.log(`  ${c('dim', `v${kb.version} | ${kb.snippets.length} snippets | revenue years: ${years}`)}\n`);
      return;
    }
    if (input === '/rebuild') {
      await session.rebuildKnowledge();
      console.log(`  ${c('green', '✓')} Knowledge base cleared\n`);
      return;
    }
    if (input === '/evidence' || input.startsWith('/evidence ')) {
      const text = input.slice(9).trim();
      if (text) await this.runEvidence(session, text, false);
      else console.log(`  ${c('dim', 'Usage: /evidence <claim or question>')}\n`);
      return;
    }
    if (input === '/clarify' || input.startsWith('/clarify ')) {
      await this.runClarify(session, input.slice(8).trim());
      return;
    }
    if (input === '/report' || input.startsWith('/report ')) {
      await this.runReport(session, input.slice(7).trim(), false);
      return;
    }

    await this.runAsk(session, input, false);
  }

  // ── Help ────────────────────────────────────────────────────────

  printHelp(): void {
    console.log(`
  ${c('bold', 'account-plan')} ${c('dim', '— company research and account plans')}

  ${c('bold', 'Usage:')}
    account-plan <command> -c <company> [options] [text]

  ${c('bold', 'Commands:')}
    ask <question>                Answer a question about the company
    report [directive]            Generate an account plan (Markdown)
    overview                      Refresh the company overview
    research                      Timeboxed multi-topic research
    evidence <claim or question>  Evidence card from the knowledge base
    clarify [directive]           Questions worth answering before research

  ${c('bold', 'Options:')}
    -c, --company <name>          Company to research (required)
    -i, --interactive             Start the REPL
    --refresh                     Bypass cached search results
    --out <file>                  Write the report to a file
    --topics <a,b,...>            Research topics (research command)
    -v, --verbose                 Print pipeline events to stderr
    -h, --help                    Show this help

  ${c('bold', 'Environment:')}
    ANTHROPIC_API_KEY             Required. Anthropic API key.
    LLM_MODEL                     Primary model (fallbacks: LLM_FALLBACK_MODELS).
    SERPAPI_API_KEY               Web search (or GOOGLE_CSE_API_KEY + GOOGLE_CSE_CX).
    CORPUS_DIR                    Directory of extracted document text (.txt).

  ${c('bold', 'Examples:')}
    account-plan ask -c Nokia "What drove revenue in 2024?"
    account-plan report -c Nokia "compare 2025 vs 2024 revenue" --out nokia.md
    account-plan -i -c Nokia
`);
  }

  private printReplHelp(): void {
    console.log(`
  ${c('bold', 'REPL commands:')}
    /help              Show this help
    /overview          Refresh the company overview
    /research          Run timeboxed research
    /report [text]     Generate an account plan for a directive
    /evidence <text>   Evidence card for a claim or question
    /clarify [text]    Clarifying questions for a directive
    /kb                Knowledge base summary
    /rebuild           Clear the knowledge base
    /clear             Clear screen
    exit               Exit REPL
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new AccountPlanCli();
cli.start().catch((err: unknown) => {
  console.error(`${c('red', 'Fatal:')} ${describeError(err)}`);
  process.exit(1);
});
