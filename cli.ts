#!/usr/bin/env node
/**
 * docpilot CLI
 *
 * Index files into a session knowledge base, search it, and chat about a document
 */

import { program } from 'commander';
import { readFile } from 'fs/promises';
import { basename } from 'path';
import { loadConfig, type DocpilotConfig } from './src/config';
import { setLogLevel, errorMessage } from './src/logging';
import { createAIService, type AIService, type ChatMode } from './src/ai-service';
import type { KnowledgeBaseService } from './src/project-rag';

// Colors for console output
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  red: '\x1b[31m',
};

function log(message: string, color: string = colors.reset) {
  console.log(`${color}${message}${colors.reset}`);
}

function fail(message: string): never {
  log(`\n❌ ${message}\n`, colors.red);
  process.exit(1);
}

function setup(): { config: DocpilotConfig; service: AIService; kb: KnowledgeBaseService } {
  let config: DocpilotConfig;
  try {
    config = loadConfig();
  } catch (error) {
    fail(`Invalid configuration: ${errorMessage(error)}`);
  }
  setLogLevel(config.logLevel);

  const service = createAIService(config);
  const kb = service.getKnowledgeBase();
  if (!kb) {
    fail('Knowledge base is not available');
  }
  return { config, service, kb };
}

async function indexFiles(kb: KnowledgeBaseService, project: string, files: string[]): Promise<void> {
  for (const [i, file] of files.entries()) {
    const text = await readFile(file, 'utf-8');
    const result = await kb.indexResource(project, i + 1, text, basename(file));
    log(`  📄 ${file}: ${result.chunksIndexed} chunks`, colors.dim);
  }
}

interface SearchOptions {
  index?: string[];
  topK?: string;
}

interface ChatOptions {
  document?: string;
  mode: string;
  project?: string;
  index?: string[];
}

function parseMode(value: string): ChatMode {
  if (value === 'agent' || value === 'simple') return value;
  fail(`Unknown mode: ${value} (expected agent or simple)`);
}

program
  .name('docpilot')
  .description('Document assistant: agent editing and project knowledge bases')
  .version('0.1.0');

// Index command
program
  .command('index <project> <files...>')
  .description('Chunk and embed files into a project knowledge base')
  .action(async (project: string, files: string[]) => {
    const { kb } = setup();
    log(`\n📚 Indexing ${files.length} file(s) into project ${project}...\n`, colors.bright);

    try {
      await indexFiles(kb, project, files);
      const info = kb.getInfo(project);
      log(`\n✅ ${info.resourceCount} resources, ${info.chunkCount} chunks (dimension ${info.dimension ?? 'unknown'})\n`, colors.green);
    } catch (error) {
      fail(`Indexing failed: ${errorMessage(error)}`);
    }
  });

// Search command
program
  .command('search <project> <query>')
  .description('Search a project knowledge base')
  .requiredOption('-i, --index <files...>', 'Files to index before searching')
  .option('-k, --top-k <n>', 'Number of results')
  .action(async (project: string, query: string, options: SearchOptions) => {
    const { config, kb } = setup();

    try {
      await indexFiles(kb, project, options.index ?? []);
      const topK = options.topK !== undefined ? Number.parseInt(options.topK, 10) : config.rag.topK;
      const results = await kb.search(project, query, { topK });

      if (results.length === 0) {
        log('\nNo results\n', colors.yellow);
        return;
      }

      log('');
      for (const [i, result] of results.entries()) {
        log(`${i + 1}. ${result.metadata.filename} (score ${result.score.toFixed(3)})`, colors.blue);
        log(`   ${result.text.replace(/\s+/g, ' ').slice(0, 200)}\n`);
      }
    } catch (error) {
      fail(`Search failed: ${errorMessage(error)}`);
    }
  });

// Chat command
program
  .command('chat <message>')
  .description('Ask the assistant, optionally about a document')
  .option('-d, --document <file>', 'Document to discuss or edit')
  .option('-m, --mode <mode>', 'agent or simple', 'simple')
  .option('-p, --project <id>', 'Project knowledge base to retrieve from')
  .option('-i, --index <files...>', 'Files to index into the project first')
  .action(async (message: string, options: ChatOptions) => {
    const mode = parseMode(options.mode);
    const { kb, service } = setup();

    try {
      if (options.project !== undefined && options.index) {
        log(`\n📚 Indexing into project ${options.project}...`, colors.bright);
        await indexFiles(kb, options.project, options.index);
      }

      const documentContent = options.document !== undefined ? await readFile(options.document, 'utf-8') : undefined;

      for await (const event of service.chatStream({
        message,
        mode,
        projectId: options.project,
        documentContent,
        documentId: options.document !== undefined ? basename(options.document) : undefined,
      })) {
        switch (event.type) {
          case 'sources':
            log(`\n🔎 ${event.sources.length} source(s) retrieved`, colors.dim);
            break;
          case 'thinking':
            log(`\n🤔 Iteration ${event.iteration}`, colors.dim);
            break;
          case 'tool_call':
            log(`🔧 ${event.name} ${JSON.stringify(event.arguments)}`, colors.blue);
            break;
          case 'tool_result':
            log(`   ${event.result.success ? '✓' : '✗'} ${event.name}`, event.result.success ? colors.green : colors.red);
            break;
          case 'error':
            log(`⚠️  ${event.error}`, colors.yellow);
            break;
          case 'text':
            break;
          case 'done': {
            const { response } = event;
            log(`\n${response.message}\n`, colors.bright);

            for (const op of response.operations) {
              const range = op.position ? ` [${op.position.start}, ${op.position.end})` : '';
              log(`  ✏️  ${op.operationType}${range}`, colors.blue);
            }
            if (response.metadata.modifiedContent !== undefined) {
              log('\n── Modified document ──', colors.dim);
              log(response.metadata.modifiedContent);
            }
            log(`\n${response.tokensUsed} tokens · session ${response.sessionId}\n`, colors.dim);

            if (response.metadata.error !== undefined) {
              process.exitCode = 1;
            }
            break;
          }
        }
      }
    } catch (error) {
      fail(`Chat failed: ${errorMessage(error)}`);
    }
  });

// Info command
program
  .command('info')
  .description('Show the active configuration')
  .action(() => {
    const { config } = setup();

    log('\n📦 docpilot configuration\n', colors.bright);
    log(`  LLM:        ${config.llm.provider} / ${config.llm.model}`, colors.blue);
    log(`  Fallback:   ${config.llm.fallbackStrategy} ${config.llm.fallbackProviders.join(', ')}`);
    log(`  Embeddings: ${config.embedding.provider} / ${config.embedding.model}`, colors.blue);
    log(`  Chunking:   ${config.rag.strategy}, size ${config.rag.chunkSize}, overlap ${config.rag.chunkOverlap}`);
    log(`  Retrieval:  top ${config.rag.topK}, min score ${config.rag.minScore}`);
    log(`  Agent:      ${config.agent.maxIterations} iterations max\n`);
  });

// Show help if no command
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync().catch((error: unknown) => fail(errorMessage(error)));
}
