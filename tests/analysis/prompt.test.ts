import { CaptureArtifact } from '../../src/domain/artifact';
import {
  DEFAULT_TEMPLATE_FIELDS,
  buildPrompts,
  promptVariables,
  renderPrompt,
  stripHtml,
} from '../../src/analysis/prompt';

const artifact: CaptureArtifact = {
  id: 'cap_1',
  deviceId: 'cam-1',
  imagePath: '/tmp/cap_1.png',
  resolution: { width: 640, height: 480 },
  capturedAt: '2026-10-18T09:30:15.000Z',
  mimeType: 'image/png',
  byteLength: 4,
  sha256: 'abc',
};

describe('promptVariables', () => {
  it('falls back to the default field list', () => {
    expect(promptVariables(artifact, '   ')).toEqual({
      artifactId: 'cap_1',
      deviceId: 'cam-1',
      capturedAt: '2026-10-18T09:30:15.000Z',
      resolution: '640x480',
      template: DEFAULT_TEMPLATE_FIELDS,
    });
  });
});

describe('renderPrompt', () => {
  it('fills known placeholders and leaves unknown ones', () => {
    const vars = promptVariables(artifact, 'name, serial');
    expect(renderPrompt('{{artifactId}} {{ unknown }} {{ template }}', vars)).toBe('cap_1 {{ unknown }} name, serial');
  });
});

describe('stripHtml', () => {
  it('turns block boundaries into lines and decodes entities', () => {
    expect(stripHtml('<h1>Equipment</h1><p>Name:&nbsp;<b>x</b></p><ul><li>a &amp; b</li></ul>')).toBe(
      'Equipment\nName: x\na & b',
    );
  });
});

describe('buildPrompts', () => {
  it('uses the default prompts and appends additional instructions', () => {
    const prompts = buildPrompts(artifact, { additionalPrompt: '  Focus on the serial plate. ' });
    expect(prompts.user).toBe(
      'Analyze the laboratory item in this image (artifact cap_1, captured by cam-1 at 2026-10-18T09:30:15.000Z, 640x480). ' +
        'Give the summary section first, then the detailed fields.\nFocus on the serial plate.',
    );
    expect(prompts.system).toContain(DEFAULT_TEMPLATE_FIELDS);
    expect(prompts.system).not.toContain('{{template}}');
  });

  it('renders a custom system template', () => {
    const prompts = buildPrompts(artifact, { promptTemplate: 'Fields: {{template}} from {{deviceId}}', templateText: 'name' });
    expect(prompts.system).toBe('Fields: name from cam-1');
  });
});
