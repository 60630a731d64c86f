import { describe, expect, it } from 'vitest';

import { NotFoundError } from '@core/errors/index.js';
import { FlowConfigCache, FlowResolver } from '@services/cache/flow-config-cache.js';
import { DEFAULT_LIST_PROMPT, Renderer } from '@services/conversation/renderer.js';
import { FakeChannel, InMemoryFlowSource } from '@test/utils/fakes.js';

const flow = {
  states: {
    MENU: {
      type: 'interactive_list',
      body: '  ',
      list: {
        header: 'Hola {{name}}',
        footer: 'Pie {{unknown}}',
        button_text: 'Ver {{name}}',
        sections: [
          {
            title: 'Para {{name}}',
            rows: [{ id: 'A_{{name}}', title: 'Fila {{name}}', description: 'Desc {{name}}' }],
          },
        ],
      },
      on_select_next: {},
    },
    GREET: { type: 'text', body: 'Hola {{name}}, ¿zona?' },
  },
};

function renderer() {
  return new Renderer(new FlowResolver(new FlowConfigCache(), new InMemoryFlowSource({ broker: flow })));
}

describe('Renderer.renderAndSend', () => {
  it('sends a single text message for text states', async () => {
    const channel = new FakeChannel();
    await renderer().renderAndSend('broker', 'GREET', channel, '5491100000000', { name: 'Ana' });
    expect(channel.sent).toEqual([{ kind: 'text', to: '5491100000000', body: 'Hola Ana, ¿zona?' }]);
  });

  it('sends exactly one list with every visible field substituted', async () => {
    const channel = new FakeChannel();
    await renderer().renderAndSend('broker', 'MENU', channel, '5491100000000', { name: 'Ana' });

    expect(channel.sent).toEqual([
      {
        kind: 'list',
        to: '5491100000000',
        header: 'Hola Ana',
        body: DEFAULT_LIST_PROMPT,
        footer: 'Pie {{unknown}}',
        buttonText: 'Ver Ana',
        sections: [
          {
            title: 'Para Ana',
            rows: [{ id: 'A_{{name}}', title: 'Fila Ana', description: 'Desc Ana' }],
          },
        ],
      },
    ]);
  });

  it('appends extra sections after the configured ones', async () => {
    const channel = new FakeChannel();
    await renderer().renderAndSend('broker', 'MENU', channel, 'u1', { name: 'Ana' }, {
      sections: [{ title: 'Turnos', rows: [{ id: 'SLOT_1', title: 'Mon 19 09:00', description: '' }] }],
    });
    const [sent] = channel.sent;
    expect(sent.kind).toBe('list');
    if (sent.kind !== 'list') return;
    expect(sent.sections.map((s) => s.title)).toEqual(['Para Ana', 'Turnos']);
  });

  it('fails for a state that does not exist', async () => {
    const channel = new FakeChannel();
    await expect(renderer().renderAndSend('broker', 'NOPE', channel, 'u1', {})).rejects.toBeInstanceOf(
      NotFoundError,
    );
    expect(channel.sent).toEqual([]);
  });

  it('propagates channel failures', async () => {
    const channel = new FakeChannel();
    channel.failOn.add(0);
    await expect(renderer().renderAndSend('broker', 'GREET', channel, 'u1', {})).rejects.toThrow('channel down');
  });
});
