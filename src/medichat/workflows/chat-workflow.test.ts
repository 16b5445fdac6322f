import assert from 'node:assert';
import { describe, it } from 'node:test';
import { buildSymptomPrompt } from '../agents/prompts';
import { buildPdf, FakeGateway } from '../test-helpers';
import { DocumentExtractor } from '../tools/document-extractors';
import { ChatWorkflow, decodeBase64, DOCX_MIME_TYPE, InvalidChatRequestError } from './chat-workflow';

const toBase64 = (text: string) => Buffer.from(text, 'utf8').toString('base64');

const failingExtractor: DocumentExtractor = async () => null;

describe('ChatWorkflow', () => {
  it('sends a symptom description through the symptom template', async () => {
    const gateway = new FakeGateway('Rest and hydrate.');
    const workflow = new ChatWorkflow({ gateway });

    const reply = await workflow.handle({ message: 'sore throat for two days' });

    assert.strictEqual(reply, 'Rest and hydrate.');
    assert.deepStrictEqual(gateway.calls, [
      { method: 'generateText', args: [buildSymptomPrompt('sore throat for two days')] }
    ]);
  });

  it('passes the original base64 and mime type for images', async () => {
    const gateway = new FakeGateway('Looks like a healthy scan.');
    const workflow = new ChatWorkflow({ gateway });

    const reply = await workflow.handle({ fileData: 'iVBORw0KGgo=', fileType: 'image/png', fileName: 'scan.png' });

    assert.strictEqual(reply, 'Looks like a healthy scan.');
    assert.deepStrictEqual(gateway.calls, [{ method: 'analyzeImage', args: ['iVBORw0KGgo=', 'image/png'] }]);
  });

  it('builds the report prompt from an uploaded PDF', async () => {
    const gateway = new FakeGateway();
    const workflow = new ChatWorkflow({ gateway });

    await workflow.handle({
      fileData: buildPdf(['BP 120/80']).toString('base64'),
      fileType: 'application/pdf',
      fileName: 'checkup.pdf'
    });

    assert.strictEqual(gateway.calls.length, 1);
    assert.strictEqual(gateway.calls[0].method, 'generateText');
    const prompt = gateway.calls[0].args[0];
    assert.ok(prompt.includes('BP 120/80'));
    assert.ok(prompt.includes("'checkup.pdf'"));
    assert.ok(!prompt.includes("User's health issue"));
  });

  it('answers consecutive PDF uploads from their own content', async () => {
    const gateway = new FakeGateway();
    const workflow = new ChatWorkflow({ gateway });

    await workflow.handle({ fileData: buildPdf(['Pulse 72']).toString('base64'), fileType: 'application/pdf', fileName: 'pulse.pdf' });
    await workflow.handle({ fileData: buildPdf(['BP 120/80']).toString('base64'), fileType: 'application/pdf', fileName: 'bp.pdf' });

    assert.strictEqual(gateway.calls.length, 2);
    assert.ok(gateway.calls[0].args[0].includes('Pulse 72'));
    assert.ok(gateway.calls[0].args[0].includes("'pulse.pdf'"));
    assert.ok(!gateway.calls[0].args[0].includes('BP 120/80'));
    assert.ok(gateway.calls[1].args[0].includes('BP 120/80'));
    assert.ok(gateway.calls[1].args[0].includes("'bp.pdf'"));
    assert.ok(!gateway.calls[1].args[0].includes('Pulse 72'));
  });

  it('uses the file, not the message, when both are present', async () => {
    const gateway = new FakeGateway();
    const workflow = new ChatWorkflow({ gateway, extractDocx: async () => 'Cholesterol 5.2\n' });

    await workflow.handle({
      message: 'please check this',
      fileData: toBase64('docx bytes'),
      fileType: DOCX_MIME_TYPE,
      fileName: 'labs.docx'
    });

    assert.strictEqual(gateway.calls.length, 1);
    assert.ok(gateway.calls[0].args[0].endsWith('Report content: Cholesterol 5.2\n'));
    assert.ok(gateway.calls[0].args[0].includes("'labs.docx'"));
  });

  it('names the file when PDF extraction fails', async () => {
    const gateway = new FakeGateway();
    const workflow = new ChatWorkflow({ gateway, extractPdf: failingExtractor });

    const reply = await workflow.handle({ fileData: toBase64('%PDF-broken'), fileType: 'application/pdf', fileName: 'broken.pdf' });

    assert.strictEqual(
      reply,
      "Could not extract text from PDF 'broken.pdf'. Please ensure it's a readable PDF or describe its content in text."
    );
    assert.strictEqual(gateway.calls.length, 0);
  });

  it('treats a PDF without any text as an extraction failure', async () => {
    const gateway = new FakeGateway();
    const workflow = new ChatWorkflow({ gateway, extractPdf: async () => '\n\n' });

    const reply = await workflow.handle({ fileData: toBase64('%PDF'), fileType: 'application/pdf', fileName: 'scan-only.pdf' });

    assert.ok(reply.startsWith("Could not extract text from PDF 'scan-only.pdf'."));
    assert.strictEqual(gateway.calls.length, 0);
  });

  it('names the file when DOCX extraction fails', async () => {
    const gateway = new FakeGateway();
    const workflow = new ChatWorkflow({ gateway, extractDocx: failingExtractor });

    const reply = await workflow.handle({ fileData: toBase64('PK'), fileType: DOCX_MIME_TYPE, fileName: 'notes.docx' });

    assert.strictEqual(
      reply,
      "Could not extract text from DOCX 'notes.docx'. Please ensure it's a valid DOCX file or describe its content in text."
    );
    assert.strictEqual(gateway.calls.length, 0);
  });

  it('sends a DOCX of empty paragraphs on to the AI', async () => {
    const gateway = new FakeGateway();
    const workflow = new ChatWorkflow({ gateway, extractDocx: async () => '\n\n' });

    const reply = await workflow.handle({ fileData: toBase64('PK'), fileType: DOCX_MIME_TYPE, fileName: 'blank.docx' });

    assert.strictEqual(reply, 'fake answer');
    assert.ok(gateway.calls[0].args[0].endsWith('Report content: \n\n'));
  });

  it('replaces invalid UTF-8 in plain text uploads and carries on', async () => {
    const gateway = new FakeGateway();
    const workflow = new ChatWorkflow({ gateway });
    const bytes = Buffer.from([0x48, 0x52, 0x20, 0x37, 0x32, 0xff, 0xfe]);

    const reply = await workflow.handle({ fileData: bytes.toString('base64'), fileType: 'text/plain', fileName: 'pulse.txt' });

    assert.strictEqual(reply, 'fake answer');
    assert.ok(gateway.calls[0].args[0].endsWith('Report content: HR 72\uFFFD\uFFFD'));
  });

  for (const fileType of ['application/zip', 'video/mp4', 'application/msword']) {
    it(`refuses ${fileType} without calling the AI`, async () => {
      const gateway = new FakeGateway();
      const workflow = new ChatWorkflow({ gateway });

      const reply = await workflow.handle({ fileData: toBase64('data'), fileType, fileName: 'upload.bin' });

      assert.strictEqual(
        reply,
        `Unsupported file type for analysis: ${fileType}. Please upload a PDF, DOCX, image, or plain text file.`
      );
      assert.strictEqual(gateway.calls.length, 0);
    });
  }

  it('returns an empty reply when there is nothing to answer', async () => {
    const gateway = new FakeGateway();
    const workflow = new ChatWorkflow({ gateway });

    assert.strictEqual(await workflow.handle({}), '');
    assert.strictEqual(await workflow.handle({ message: '', fileData: null }), '');
    assert.strictEqual(gateway.calls.length, 0);
  });

  it('falls back to the message when fileData has no fileType', async () => {
    const gateway = new FakeGateway();
    const workflow = new ChatWorkflow({ gateway });

    await workflow.handle({ message: 'dizzy', fileData: toBase64('x') });

    assert.deepStrictEqual(gateway.calls, [{ method: 'generateText', args: [buildSymptomPrompt('dizzy')] }]);
  });

  it('rejects invalid base64 file data', async () => {
    const workflow = new ChatWorkflow({ gateway: new FakeGateway() });

    await assert.rejects(
      workflow.handle({ fileData: 'not*base64!', fileType: 'text/plain', fileName: 'a.txt' }),
      InvalidChatRequestError
    );
  });

  it('rejects fields of the wrong type', async () => {
    const workflow = new ChatWorkflow({ gateway: new FakeGateway() });

    await assert.rejects(workflow.handle({ message: 42 }), {
      name: 'InvalidChatRequestError',
      message: 'Invalid chat request (message: Expected string, received number)'
    });
  });
});

describe('decodeBase64', () => {
  it('decodes padded input and ignores line breaks', () => {
    assert.strictEqual(decodeBase64('aGVs\nbG8=').toString('utf8'), 'hello');
  });

  it('throws on bad padding', () => {
    assert.throws(() => decodeBase64('aGVsbG8'), InvalidChatRequestError);
  });
});
