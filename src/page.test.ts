/**
 * Page Tests
 *
 * Load, render and write against real files in a temporary directory.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { BuildContext, TextRenderer } from './types.js';
import { Page, writeAtomically } from './page.js';
import { PageError } from './errors.js';
import { Markdown, Plain } from './renderers.js';
import { FIXED_NOW, LEVEL, createTestContext, createWorkspace, messagesAt } from './test-helpers.js';
import type { LogRecord } from './test-helpers.js';

type Workspace = Awaited<ReturnType<typeof createWorkspace>>;

const SHIPPED_TEMPLATES = fileURLToPath(new URL('../templates', import.meta.url));

function hasCode(code: string): (error: unknown) => boolean {
  return (error) => error instanceof PageError && error.code === code;
}

describe('Page', () => {
  let workspace: Workspace;
  let context: BuildContext;
  let records: LogRecord[];
  let outputDir: string;

  beforeEach(async () => {
    workspace = await createWorkspace();
    outputDir = join(workspace.root, 'out');
    await workspace.file('templates/default.html', '<title>{{ page.title }}</title>{{ page.content | safe }}');
    await workspace.file('templates/post.html', 'post:{{ page.field("type") }}|{{ page.author }}');
    await workspace.file('templates/vars.html', '{{ site }}|{{ page.title }}');
    ({ context, records } = createTestContext({
      templateDir: join(workspace.root, 'templates'),
      outputDir,
    }));
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  describe('load', () => {
    it('splits, normalizes and renders the body', async () => {
      const path = await workspace.file('content/hi.txt', 'title: Hi\n---\nHello');
      const page = await Page.load(path, context);

      assert.equal(page.meta.title, 'Hi');
      assert.equal(page.meta.slug, 'hi');
      assert.equal(page.meta.url, '/hi.html');
      assert.equal(page.original, 'Hello');
      assert.equal(page.content, 'Hello');
      assert.equal(page.filename, 'hi.txt');
      assert.equal(page.path, path);
      assert.equal(page.renderer, Plain);
      assert.equal(page.html, null);
    });

    it('logs the slug and renderer', async () => {
      const path = await workspace.file('content/hi.txt', 'title: Hi\n---\nHello');
      await Page.load(path, context);
      assert.deepEqual(messagesAt(records, LEVEL.info), ['Rendering hi with plain']);
    });

    it('treats a file without a delimiter as all body', async () => {
      const path = await workspace.file('content/about.md', '# About\n\nNo header here.');
      const page = await Page.load(path, context, Markdown);

      assert.equal(page.title, 'about');
      assert.equal(page.original, '# About\n\nNo header here.');
      assert.ok(page.content.includes('<h1>About</h1>'));
      assert.equal(page.datetime, FIXED_NOW);
    });

    it('reads YAML header fields', async () => {
      const path = await workspace.file(
        'content/install.md',
        [
          'title: Install Guide',
          'author: Jane Doe <jane@example.com>',
          'category: guides/setup',
          'tags: cli, setup',
          'date: 2024-03-01',
          'published: no',
          'type: post',
          '---',
          'Steps.',
        ].join('\n')
      );
      const page = await Page.load(path, context);

      assert.equal(page.slug, 'install-guide');
      assert.equal(page.author.name, 'Jane Doe');
      assert.deepEqual(page.category, ['guides', 'setup']);
      assert.deepEqual(page.tags, ['cli', 'setup']);
      assert.equal(page.datetime.toISOString(), '2024-03-01T00:00:00.000Z');
      assert.equal(page.published, false);
      assert.equal(page.url, '/guides/setup/install-guide.html');
      assert.equal(page.field('type'), 'post');
      assert.equal(page.field('nothing'), undefined);
    });

    it('uses the renderer forced by the options', async () => {
      const forced = createTestContext({ renderer: 'markdown' }).context;
      const path = await workspace.file('content/hi.txt', 'title: Hi\n---\n*Hello*');
      const page = await Page.load(path, forced);

      assert.equal(page.renderer, Markdown);
      assert.ok(page.content.includes('<em>Hello</em>'));
    });

    it('fails with SOURCE_READ_ERROR for a missing file', async () => {
      await assert.rejects(
        Page.load(join(workspace.root, 'content/missing.md'), context),
        hasCode('SOURCE_READ_ERROR')
      );
    });

    it('fails with METADATA_PARSE_ERROR for a header that is not a mapping', async () => {
      const path = await workspace.file('content/list.md', '- a\n- b\n---\nbody');
      await assert.rejects(Page.load(path, context), hasCode('METADATA_PARSE_ERROR'));
    });

    it('fails with RENDER_ERROR when the renderer throws', async () => {
      const failing: TextRenderer = {
        name: 'failing',
        extensions: [],
        render: () => {
          throw new Error('unsupported syntax');
        },
      };
      const path = await workspace.file('content/hi.txt', 'Hello');
      await assert.rejects(Page.load(path, context, failing), (error: unknown) => {
        assert.ok(error instanceof PageError);
        assert.deepEqual(error.detail, {
          code: 'RENDER_ERROR',
          filename: 'hi.txt',
          renderer: 'failing',
          reason: 'unsupported syntax',
        });
        return true;
      });
    });

    it('starts with no subpages', async () => {
      const path = await workspace.file('content/hi.txt', 'title: Hi\n---\nHello');
      const page = await Page.load(path, context);
      assert.deepEqual(page.subpages, []);
      assert.equal(String(page), "<Page 'hi'>");
    });
  });

  describe('render', () => {
    it('renders the default template', async () => {
      const path = await workspace.file('content/hi.txt', 'title: Hi\n---\n<p>Hello</p>');
      const page = await Page.load(path, context);

      assert.equal(page.render(), '<title>Hi</title><p>Hello</p>');
      assert.equal(page.html, '<title>Hi</title><p>Hello</p>');
    });

    it('picks the template from the type field', async () => {
      const path = await workspace.file(
        'content/post.txt',
        'title: Post\ntype: post\nauthor: Jane Doe <jane@example.com>\n---\nBody'
      );
      const page = await Page.load(path, context);

      assert.equal(page.templateName, 'post.html');
      assert.equal(page.render(), 'post:post|Jane Doe &lt;jane@example.com&gt;');
    });

    it('gives the page precedence over caller variables', async () => {
      const path = await workspace.file('content/vars.txt', 'title: Hi\ntype: vars\n---\nBody');
      const page = await Page.load(path, context);
      const vars = { site: 'Example', page: 'not the page' };

      assert.equal(page.render(vars), 'Example|Hi');
      assert.deepEqual(vars, { site: 'Example', page: 'not the page' });
    });

    it('can be called again', async () => {
      const path = await workspace.file('content/vars.txt', 'title: Hi\ntype: vars\n---\nBody');
      const page = await Page.load(path, context);

      assert.equal(page.render({ site: 'One' }), 'One|Hi');
      assert.equal(page.render({ site: 'Two' }), 'Two|Hi');
      assert.equal(page.html, 'Two|Hi');
    });

    it('renders the shipped default template', async () => {
      const shipped = createTestContext({ templateDir: SHIPPED_TEMPLATES, outputDir }).context;
      const path = await workspace.file(
        'content/launch.md',
        [
          'title: Launch Notes',
          'author: Jane Doe <jane@example.com>',
          'tags: cli, setup',
          'date: 2024-03-01',
          '---',
          'Steps.',
        ].join('\n')
      );
      const page = await Page.load(path, shipped, Markdown);
      const lines = page.render().split('\n');

      assert.equal(lines[4], '<title>Launch Notes</title>');
      assert.equal(lines[5], '<meta name="author" content="Jane Doe &lt;jane@example.com&gt;">');
      assert.ok(lines.includes('<h1>Launch Notes</h1>'));
      assert.ok(lines.includes('<p><time datetime="2024-03-01T00:00:00.000Z">2024-03-01</time></p>'));
      assert.ok(lines.includes('<p>Steps.</p>'));
      assert.ok(lines.includes('<p>Tags: cli, setup</p>'));
    });

    it('leaves out author and tags from the shipped template when absent', async () => {
      const shipped = createTestContext({ templateDir: SHIPPED_TEMPLATES, outputDir }).context;
      const path = await workspace.file('content/bare.txt', 'title: Bare\n---\nBody');
      const page = await Page.load(path, shipped);
      const lines = page.render().split('\n');

      assert.equal(lines[4], '<title>Bare</title>');
      assert.equal(lines[5], '');
      assert.ok(lines.includes('<p><time datetime="2024-05-01T12:00:00.000Z">2024-05-01</time></p>'));
      assert.equal(lines.some((line) => line.startsWith('<p>Tags:')), false);
    });

    it('fails with TEMPLATE_NOT_FOUND for an unknown type', async () => {
      const path = await workspace.file('content/x.txt', 'title: X\ntype: gallery\n---\nBody');
      const page = await Page.load(path, context);

      assert.throws(() => page.render(), (error: unknown) => {
        assert.ok(error instanceof PageError);
        assert.equal(error.detail.code, 'TEMPLATE_NOT_FOUND');
        if (error.detail.code === 'TEMPLATE_NOT_FOUND') {
          assert.equal(error.detail.template, 'gallery.html');
        }
        return true;
      });
      assert.equal(page.html, null);
    });
  });

  describe('write', () => {
    it('writes under outputDir + url, creating directories', async () => {
      const path = await workspace.file('content/install.txt', 'title: Install\ncategory: guides/setup\n---\nSteps');
      const page = await Page.load(path, context);
      page.render();

      const destination = await page.write();

      assert.equal(destination, join(outputDir, 'guides', 'setup', 'install.html'));
      assert.equal(await readFile(destination, 'utf-8'), '<title>Install</title>Steps');
    });

    it('replaces an existing file and leaves no temp files', async () => {
      const path = await workspace.file('content/hi.txt', 'title: Hi\n---\nNew');
      await workspace.file('out/hi.html', 'old content that is longer than the new one');
      const page = await Page.load(path, context);
      page.render();

      await page.write();

      assert.equal(await readFile(join(outputDir, 'hi.html'), 'utf-8'), '<title>Hi</title>New');
      assert.deepEqual(await readdir(outputDir), ['hi.html']);
    });

    it('refuses to write an unrendered page', async () => {
      const path = await workspace.file('content/hi.txt', 'title: Hi\n---\nHello');
      const page = await Page.load(path, context);
      await assert.rejects(page.write(), hasCode('WRITE_ERROR'));
    });

    it('refuses urls that leave the output directory', async () => {
      const path = await workspace.file('content/evil.txt', 'title: Evil\nurl: /../../evil.html\n---\nx');
      const page = await Page.load(path, context);
      page.render();

      await assert.rejects(page.write(), hasCode('WRITE_ERROR'));
    });

    it('reports a directory that cannot be created', async () => {
      await workspace.file('blocker', 'a file where the output directory should be');
      const blocked = createTestContext({
        templateDir: join(workspace.root, 'templates'),
        outputDir: join(workspace.root, 'blocker'),
      }).context;
      const path = await workspace.file('content/hi.txt', 'title: Hi\n---\nHello');
      const page = await Page.load(path, blocked);
      page.render();

      await assert.rejects(page.write(), hasCode('WRITE_ERROR'));
      assert.equal(await readFile(join(workspace.root, 'blocker'), 'utf-8'), 'a file where the output directory should be');
    });

    it('cleans up after a failed write', async () => {
      await mkdir(join(outputDir, 'hi.html'), { recursive: true });
      const path = await workspace.file('content/hi.txt', 'title: Hi\n---\nHello');
      const page = await Page.load(path, context);
      page.render();

      await assert.rejects(page.write(), hasCode('WRITE_ERROR'));
      assert.deepEqual(await readdir(outputDir), ['hi.html']);
    });

    it('reports the write error when the temp file cannot be removed', async () => {
      const destination = join(outputDir, 'hi.html');
      const temporary = join(outputDir, 'stuck.tmp');
      await workspace.file('out/stuck.tmp/keep.txt', 'keep');

      await assert.rejects(writeAtomically(destination, 'Hello', temporary), (error: unknown) => {
        assert.ok(error instanceof PageError);
        assert.equal(error.detail.code, 'WRITE_ERROR');
        if (error.detail.code === 'WRITE_ERROR') {
          assert.equal(error.detail.path, destination);
          assert.ok(error.detail.reason.includes(`; could not remove ${temporary}: `));
        }
        return true;
      });
      assert.deepEqual(await readdir(outputDir), ['stuck.tmp']);
    });

    it('tolerates pages racing to create the same directories', async () => {
      const sources = await Promise.all(
        ['one', 'two', 'three', 'four'].map((name, index) =>
          workspace.file(
            `content/${name}.txt`,
            `title: ${name}\ncategory: shared/${index % 2 === 0 ? 'even' : 'odd'}\n---\n${name}`
          )
        )
      );
      const pages = await Promise.all(sources.map((source) => Page.load(source, context)));
      for (const page of pages) {
        page.render();
      }

      const written = await Promise.all(pages.map((page) => page.write()));

      assert.deepEqual(written, [
        join(outputDir, 'shared', 'even', 'one.html'),
        join(outputDir, 'shared', 'odd', 'two.html'),
        join(outputDir, 'shared', 'even', 'three.html'),
        join(outputDir, 'shared', 'odd', 'four.html'),
      ]);
      assert.deepEqual((await readdir(join(outputDir, 'shared', 'even'))).sort(), ['one.html', 'three.html']);
    });
  });
});
