import path from 'path';
import { FileDocumentStore } from '../../../documents/src/document-store.js';
import { InMemoryJobStore } from '../../../jobs/src/job-store.js';
import { StageTemplateLoader } from '../../../prompts/src/copyright-templates.js';
import { DocumentRenderer, RenderData } from '../../../rendering/src/types.js';
import { EnvCredentialsProvider } from '../../../utils/credentials.js';
import { ChatCompletionTransport, ChatRequest, LLMClient } from '../../../utils/llm-client.js';
import { silentLogger } from '../../../utils/logger.js';
import { InProcessMergeRunner } from '../../../workspace/src/merge.js';
import { WorkspaceManager } from '../../../workspace/src/workspace.js';
import { RetryPolicyManager } from '../../../../server/resilience/retry-policies.js';
import { PipelineDeps } from '../../src/types.js';

export const ROOT = path.resolve(__dirname, '../../../..');

export const FIXED_NOW = new Date(2026, 2, 1, 9, 5, 7);

/**
 * Answers each completion with the next scripted reply, in order
 */
export class ScriptedTransport implements ChatCompletionTransport {
  requests: ChatRequest[] = [];

  constructor(private replies: string[]) {}

  async complete(request: ChatRequest): Promise<string | null> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw Object.assign(new Error('No scripted reply left'), { status: 400 });
    }
    return reply;
  }

  async *stream(request: ChatRequest): AsyncIterable<string> {
    this.requests.push(request);
    yield* this.replies.splice(0);
  }

  userPrompt(index: number): string {
    return this.requests[index]?.messages[1]?.content ?? '';
  }

  systemPrompt(index: number): string {
    return this.requests[index]?.messages[0]?.content ?? '';
  }
}

export class RecordingRenderer implements DocumentRenderer {
  calls: Array<{ templateName: string; data: RenderData }> = [];

  async render(templateName: string, data: RenderData): Promise<Uint8Array> {
    this.calls.push({ templateName, data });
    return new TextEncoder().encode(`rendered ${templateName}`);
  }
}

export interface TestHarness {
  deps: PipelineDeps;
  jobs: InMemoryJobStore;
  documents: FileDocumentStore;
  renderer: RecordingRenderer;
  transport: ScriptedTransport;
}

export function createHarness(tempDir: string, replies: string[], apiKey = 'test-secret'): TestHarness {
  const transport = new ScriptedTransport(replies);
  const jobs = new InMemoryJobStore();
  const documents = new FileDocumentStore({ documentsDir: path.join(tempDir, 'documents'), dataDir: tempDir });
  const renderer = new RecordingRenderer();
  const retryManager = new RetryPolicyManager(async () => undefined, silentLogger);

  const deps: PipelineDeps = {
    jobs,
    documents,
    renderer,
    credentials: new EnvCredentialsProvider({ apiKey, baseUrl: 'http://localhost:9/v1', model: 'test-model' }),
    createClient: credentials =>
      new LLMClient(transport, { model: credentials.model, maxAttempts: 3, backoffStepMs: 0 }, retryManager),
    templates: new StageTemplateLoader({ templatesDir: path.join(ROOT, 'templates/copyright') }),
    workspace: new WorkspaceManager({
      workspacesDir: path.join(tempDir, 'workspaces'),
      archivesDir: path.join(tempDir, 'zips'),
      vendorDir: path.join(ROOT, 'vendor/copyright'),
      promptTemplatesDir: path.join(ROOT, 'templates/copyright')
    }),
    merge: new InProcessMergeRunner(),
    settings: {
      scheduleSlack: 6,
      timeRepairAttempts: 2,
      generatedDir: path.join(tempDir, 'generated'),
      resourcesDir: path.join(ROOT, 'content-engine/resources')
    },
    logger: () => undefined,
    now: () => FIXED_NOW
  };

  return { deps, jobs, documents, renderer, transport };
}

export const LESSON_TEXT = {
  knowledge_goals: '(1) Name the layers of the reference model\n(2) Describe a frame\n(3) Read an address\n',
  ability_goals: '(1) Crimp a patch cable\n(2) Test a link\n(3) Label a port\n',
  quality_goals: '(1) Work carefully\n(2) Share findings\n(3) Keep the bench tidy\n',
  teaching_content: 'Cabling overview.\n\nHands-on crimping.\n',
  teaching_focus: '(1) Pin order\n(2) Link testing\n',
  teaching_difficulty: '(1) Pair untwisting\n(2) Reading tester output\n',
  review_content: 'We recap the previous session and introduce cabling.\n',
  assessment_content: 'Each pair tests one cable.\n',
  summary_content: '1. Pin order\n2. Common mistakes\n3. Tester results\n',
  homework_content: 'Sketch the pin order.\n'
};

/**
 * Model reply for a lesson plan; the system fields are deliberately wrong
 */
export function lessonReply(times: number[], reviewTime = 10, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({
    project_name: 'Model chosen name',
    week: 9,
    sequence: 9,
    hours: 9,
    total_hours: 99,
    ...LESSON_TEXT,
    review_time: reviewTime,
    new_lessons: times.map((time, index) => ({ content: `Task ${index + 1}`, time })),
    ...extra
  });
}
