// @vitest-environment jsdom
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

const staticDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../static');
const page = fs.readFileSync(path.join(staticDir, 'index.html'), 'utf8');
const script = fs.readFileSync(path.join(staticDir, 'app.js'), 'utf8');

const listing = {
  'Chess Club': {
    description: 'Learn strategies and compete in chess tournaments',
    schedule: 'Fridays, 3:30 PM - 5:00 PM',
    max_participants: 12,
    participants: ['michael@mergington.edu']
  }
};

function jsonResponse(body: unknown) {
  return { ok: true, json: async () => body };
}

function unregisterButton(): HTMLButtonElement {
  const button = document.querySelector('button.unregister');
  if (!(button instanceof HTMLButtonElement)) {
    throw new Error('No unregister button rendered');
  }
  return button;
}

function messageBox(): HTMLElement {
  const message = document.getElementById('message');
  if (!message) {
    throw new Error('No message element');
  }
  return message;
}

describe('static front end', () => {
  let calls = 0;

  beforeEach(async () => {
    calls = 0;
    vi.useFakeTimers();
    vi.stubGlobal('fetch', vi.fn(async (_url: string, init?: { method?: string }) => {
      if (init?.method === 'POST') {
        calls += 1;
        return jsonResponse({ message: `Done ${calls}` });
      }
      return jsonResponse(listing);
    }));

    document.documentElement.innerHTML = page;
    new Function(script)();
    document.dispatchEvent(new Event('DOMContentLoaded'));
    await vi.advanceTimersByTimeAsync(0);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  it('renders activities with their participants', () => {
    expect(document.querySelector('.activity-card h4')?.textContent).toBe('Chess Club');
    expect(document.querySelectorAll('.participants li')).toHaveLength(1);
  });

  it('keeps a newer message visible for its full duration', async () => {
    unregisterButton().click();
    await vi.advanceTimersByTimeAsync(3000);

    unregisterButton().click();
    await vi.advanceTimersByTimeAsync(2500);

    expect(messageBox().textContent).toBe('Done 2');
    expect(messageBox().classList.contains('hidden')).toBe(false);

    await vi.advanceTimersByTimeAsync(2500);
    expect(messageBox().classList.contains('hidden')).toBe(true);
  });
});
