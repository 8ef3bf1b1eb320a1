#!/usr/bin/env node
import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { PdfTextExtractor } from '../services/document/PdfTextExtractor.js';
import { OpenAILLMService } from '../services/llm/OpenAILLMService.js';
import { ExtractionInvoker } from '../services/extraction/ExtractionInvoker.js';
import { ExtractionPipeline } from '../services/extraction/ExtractionPipeline.js';
import { serializeResult } from '../services/schema/ResultMaterializer.js';
import { OutputWriter } from '../services/storage/OutputWriter.js';
import { parseArgs, type CliArgs } from './args.js';
import { cleanPathInput, collectSchema, createPrompter } from './prompts.js';

const HELP = `
Interactive PDF extraction - define fields, pick a PDF, get JSON back

Usage:
  docshape [options]

Options:
  --output <path>      Where to save the result (default: ${config.output.path})
  --no-save            Print the result without saving it
  --help               Show this help message

Field types: str, int, float, list (anything else is treated as str)
Enter 'done' as the field name to finish the schema.
`;

const main = async (): Promise<void> => {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    console.log(HELP);
    process.exitCode = 1;
    return;
  }

  if (args.help) {
    console.log(HELP);
    return;
  }

  const prompter = createPrompter();

  try {
    console.log('\n=== Define Your Schema ===');
    const session = await collectSchema(prompter.ask);

    if (session.fieldCount === 0) {
      console.log('No fields defined.');
      process.exitCode = 1;
      return;
    }

    const definition = session.finish();

    const filePath = cleanPathInput(await prompter.ask('\nEnter PDF file path: '));
    if (!filePath || !existsSync(filePath)) {
      console.log('File not found.');
      process.exitCode = 1;
      return;
    }

    const content = await readFile(filePath);
    const pipeline = new ExtractionPipeline(
      new PdfTextExtractor(),
      new ExtractionInvoker(new OpenAILLMService())
    );

    logger.info({ filePath, fieldCount: definition.fields.length }, 'Starting extraction');

    const output = serializeResult(await pipeline.runWithDefinition(content, definition));
    console.log(output);

    if (!args.noSave) {
      const outputPath = args.output ?? config.output.path;
      if (await new OutputWriter().write(outputPath, output)) {
        console.log(`\nSaved to ${outputPath}`);
      } else {
        console.warn(`\nWarning: could not save output to ${outputPath}`);
      }
    }
  } catch (error) {
    logger.error({ error }, 'Extraction failed');
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  } finally {
    prompter.close();
  }
};

void main();
