import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { FileConfigStore, errorMessage, openPipeline } from '../src/index.js';

const here = path.dirname(fileURLToPath(import.meta.url));

const questions = [
  'How do I calibrate the pH meter?',
  'What causes low signal in HPLC?',
  'Tell me about DNA extraction from blood.',
  'What should I do for a chemical spill?',
  'What are the results for batch 20250610 pH?',
  'How do I fix my broken centrifuge?',
];

export async function runLimsDemo(): Promise<void> {
  const pipeline = await openPipeline({
    configStore: new FileConfigStore({ filePath: path.join(here, 'lims-demo.config.json') }),
    baseDir: here,
    providers: {
      aiSdk: { openaiApiKey: process.env.OPENAI_API_KEY },
      ollama: { host: process.env.OLLAMA_HOST },
    },
  });

  for (const question of questions) {
    const run = pipeline.run(question);
    const answer = run.result.catch((e: unknown) => `(failed: ${errorMessage(e)})`);
    let retrieved = 0;
    for await (const ev of run.events) {
      if (ev.type === 'retrieval_results') retrieved = ev.resultCount;
    }
    process.stdout.write(
      `\nUser: ${question}\n(${retrieved} record(s) retrieved)\n\n${await answer}\n\n---------------------------------\n`
    );
  }
}

await runLimsDemo();
