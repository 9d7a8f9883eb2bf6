import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { renderReport } from '../src/report/index.js';
import type { BenchmarkResults } from '../src/schema/index.js';

const NOW = new Date(2026, 0, 2, 3, 4, 5);

function render(results: BenchmarkResults): string[] {
  return renderReport(results, { now: NOW }).split('\n');
}

/** Lines following the first line equal to `heading`. */
function after(lines: string[], heading: string, count: number): string[] {
  const index = lines.indexOf(heading);
  assert.notEqual(index, -1, `missing line: ${heading}`);
  return lines.slice(index + 1, index + 1 + count);
}

describe('renderReport', () => {
  describe('header', () => {
    it('writes title, generation time and test date', () => {
      const lines = render({ timestamp: '2026-03-14T09:30:00Z' });
      assert.deepEqual(lines.slice(0, 5), [
        '# PHP MCP Server Benchmark Report',
        '',
        '**Generated:** 2026-01-02 03:04:05',
        '**Test Date:** 2026-03-14T09:30:00Z',
        '',
      ]);
    });

    it('uses the configured title', () => {
      const lines = renderReport({}, { now: NOW, title: 'Nightly' }).split('\n');
      assert.equal(lines[0], '# Nightly');
    });
  });

  describe('empty document', () => {
    const lines = render({});

    it('fills the environment with placeholders', () => {
      assert.deepEqual(after(lines, '## 🖥️ Test Environment', 5), [
        '',
        '- **OS:** N/A',
        '- **Architecture:** N/A',
        '- **Kernel:** N/A',
        '',
      ]);
    });

    it('sets the test date to N/A', () => {
      assert.equal(lines[3], '**Test Date:** N/A');
    });

    it('omits the optional sections', () => {
      assert.equal(lines.includes('## 📋 Test Configuration'), false);
      assert.equal(lines.includes('| Category | Winner |'), false);
      assert.equal(lines.includes('### Startup Performance'), false);
    });

    it('renders every comparison row with placeholders', () => {
      assert.deepEqual(after(lines, '|--------|-----------|-----|------|--------|', 4), [
        '| Binary Size | N/A (needs runtime) | N/A MB | N/A MB | Rust |',
        '| Startup Time | N/A ms | N/A ms | N/A ms | Rust |',
        '| Memory Peak | N/A MB | N/A MB | N/A MB | Rust |',
        '| Full Analysis | N/A ms | N/A ms | N/A ms | Rust |',
      ]);
    });

    it('defaults operation timings to zero', () => {
      assert.deepEqual(
        after(lines, '|-----------|-----------|-----|------|---------------------|', 5),
        [
          '| Dependency Analysis | 0 ms | 0 ms | 0 ms | N/A |',
          '| PSR-4 Validation | 0 ms | 0 ms | 0 ms | N/A |',
          '| Namespace Detection | 0 ms | 0 ms | 0 ms | N/A |',
          '| Security Audit | 0 ms | 0 ms | 0 ms | N/A |',
          '| License Analysis | 0 ms | 0 ms | 0 ms | N/A |',
        ],
      );
    });

    it('leaves the ranking list empty', () => {
      assert.deepEqual(after(lines, '**Performance Ranking:**', 2), [
        '',
        '**Final Recommendation:**',
      ]);
    });
  });

  it('tolerates null sections', () => {
    const lines = render({
      system: null,
      test_details: null,
      winners: null,
      results: null,
      summary: null,
    });
    assert.equal(lines.includes('- **OS:** N/A'), true);
    assert.equal(lines.includes('## 📋 Test Configuration'), false);
  });

  describe('environment', () => {
    it('adds CPU and memory only when present', () => {
      const lines = render({
        system: { os: 'Linux', arch: 'arm64', kernel: '6.1.0', cpu: 'Test CPU' },
      });
      assert.deepEqual(after(lines, '## 🖥️ Test Environment', 6), [
        '',
        '- **OS:** Linux',
        '- **Architecture:** arm64',
        '- **Kernel:** 6.1.0',
        '- **CPU:** Test CPU',
        '',
      ]);
    });
  });

  describe('test configuration', () => {
    it('renders all five lines when the section exists', () => {
      const lines = render({ test_details: { repository: 'sample/app', php_files: 98 } });
      assert.deepEqual(after(lines, '## 📋 Test Configuration', 7), [
        '',
        '- **Repository:** sample/app',
        '- **Files Analyzed:** N/A',
        '- **PHP Files:** 98',
        '- **Dependencies:** N/A',
        '- **Test Runs:** N/A',
        '',
      ]);
    });
  });

  describe('loosely typed leaves', () => {
    it('prints list and object values as JSON', () => {
      const lines = render({
        system: { os: 'Linux', arch: 'x86_64', kernel: { major: 6, minor: 1 } },
        test_details: { dependencies: ['symfony/console', 'monolog/monolog'] },
      });
      assert.equal(lines.includes('- **Kernel:** {"major":6,"minor":1}'), true);
      assert.equal(
        lines.includes('- **Dependencies:** ["symfony/console","monolog/monolog"]'),
        true,
      );
    });

    it('ignores results entries that are not objects', () => {
      const lines = render({
        results: {
          TypeScript: 'skipped',
          Rust: { startup_time_ms: 50 },
          notes: 'ci',
        },
      });
      assert.equal(
        lines.includes('| Startup Time | N/A ms | N/A ms | 50 ms | Rust |'),
        true,
      );
    });
  });

  describe('performance summary', () => {
    it('lists winners in insertion order with readable labels', () => {
      const lines = render({
        winners: { binary_size: 'Rust', startup_time: 'Rust' },
      });
      assert.deepEqual(after(lines, '| Category | Winner |', 4), [
        '|----------|--------|',
        '| Binary Size | **Rust** |',
        '| Startup Time | **Rust** |',
        '',
      ]);
    });
  });

  describe('detailed results', () => {
    it('shows startup times with a fixed Rust winner', () => {
      const lines = render({
        results: {
          TypeScript: { startup_time_ms: 100 },
          Rust: { startup_time_ms: 50 },
        },
      });
      assert.equal(
        lines.includes('| Startup Time | 100 ms | N/A ms | 50 ms | Rust |'),
        true,
      );
    });

    it('keeps the Rust winner even when another implementation is faster', () => {
      const lines = render({
        results: {
          TypeScript: { full_analysis_ms: 10 },
          Go: { full_analysis_ms: 5 },
          Rust: { full_analysis_ms: 500 },
        },
      });
      assert.equal(
        lines.includes('| Full Analysis | 10 ms | 5 ms | 500 ms | Rust |'),
        true,
      );
    });

    it('never shows a TypeScript binary size', () => {
      const lines = render({
        results: {
          TypeScript: { package_size_mb: 42.5 },
          Go: { binary_size_mb: 8.2 },
          Rust: { binary_size_mb: 4.1 },
        },
      });
      assert.equal(
        lines.includes('| Binary Size | N/A (needs runtime) | 8.2 MB | 4.1 MB | Rust |'),
        true,
      );
    });
  });

  describe('operation breakdown', () => {
    it('computes the Rust speedup over TypeScript', () => {
      const lines = render({
        results: {
          TypeScript: { dependency_analysis_ms: 100 },
          Rust: { dependency_analysis_ms: 20 },
        },
      });
      assert.equal(
        lines.includes('| Dependency Analysis | 100 ms | 0 ms | 20 ms | 80.0% faster |'),
        true,
      );
    });

    it('skips the speedup for a zero TypeScript timing', () => {
      const lines = render({
        results: {
          TypeScript: { security_audit_ms: 0 },
          Go: { security_audit_ms: 12 },
          Rust: { security_audit_ms: 30 },
        },
      });
      assert.equal(
        lines.includes('| Security Audit | 0 ms | 12 ms | 30 ms | N/A |'),
        true,
      );
    });
  });

  describe('key insights', () => {
    it('renders only the entries present in the summary', () => {
      const lines = render({
        summary: {
          lowest_memory: {
            language: 'Rust',
            memory_mb: 12,
            improvement_vs_highest: '85%',
          },
        },
      });
      assert.deepEqual(after(lines, '## 💡 Key Insights', 6), [
        '',
        '### Memory Efficiency',
        '- **Winner:** Rust',
        '- **Usage:** 12 MB',
        '- **Improvement:** 85% less than highest',
        '',
      ]);
      assert.equal(lines.includes('### Startup Performance'), false);
      assert.equal(lines.includes('### Analysis Speed'), false);
    });

    it('copies improvement strings verbatim', () => {
      const lines = render({
        summary: {
          fastest_startup: {
            language: 'Go',
            time_ms: 20,
            improvement_vs_slowest: '5.0x',
          },
          fastest_analysis: {
            language: 'Rust',
            time_ms: 100,
            improvement_vs_slowest: '88.9%',
          },
        },
      });
      assert.deepEqual(after(lines, '### Startup Performance', 3), [
        '- **Winner:** Go',
        '- **Time:** 20 ms',
        '- **Improvement:** 5.0x faster than slowest',
      ]);
      assert.deepEqual(after(lines, '### Analysis Speed', 3), [
        '- **Winner:** Rust',
        '- **Time:** 100 ms',
        '- **Improvement:** 88.9% faster than slowest',
      ]);
    });
  });

  describe('conclusion', () => {
    it('marks first and second place and shares the third marker', () => {
      const lines = render({
        summary: {
          performance_ranking: [
            { rank: 1, language: 'Rust', score: 95 },
            { rank: 2, language: 'Go', score: 85 },
            { rank: 3, language: 'TypeScript', score: 60 },
            { rank: 4, language: 'Other', score: 10 },
          ],
        },
      });
      assert.deepEqual(after(lines, '**Performance Ranking:**', 5), [
        '1. 🥇 **Rust** (Score: 95/100)',
        '2. 🥈 **Go** (Score: 85/100)',
        '3. 🥉 **TypeScript** (Score: 60/100)',
        '4. 🥉 **Other** (Score: 10/100)',
        '',
      ]);
    });

    it('ends with the final recommendation and a trailing newline', () => {
      const report = renderReport({}, { now: NOW });
      assert.equal(
        report.endsWith(
          '- Keep TypeScript for rapid prototyping and experiments\n',
        ),
        true,
      );
    });
  });

  describe('recommendations', () => {
    it('names the configured project', () => {
      const lines = renderReport({}, { now: NOW, projectName: 'Sample' }).split('\n');
      assert.equal(lines.includes('### For Sample Platform Rebuild'), true);
      assert.equal(
        lines.includes('- Use **Rust** for the Sample production deployment'),
        true,
      );
    });

    it('defaults the project name', () => {
      const lines = render({});
      assert.equal(lines.includes('### For Dependency Buster Platform Rebuild'), true);
    });

    it('is the same regardless of the measurements', () => {
      const a = render({});
      const b = render({ results: { Go: { startup_time_ms: 1 } } });
      assert.deepEqual(
        after(a, '## 🎯 Recommendations', 27),
        after(b, '## 🎯 Recommendations', 27),
      );
    });
  });

  it('orders the sections', () => {
    const lines = render({
      test_details: {},
      winners: { speed: 'Rust' },
      summary: {},
    });
    const headings = lines.filter((line) => line.startsWith('## '));
    assert.deepEqual(headings, [
      '## 🖥️ Test Environment',
      '## 📋 Test Configuration',
      '## 🏆 Performance Summary',
      '## 📊 Detailed Benchmark Results',
      '## 🎯 Performance Breakdown by Operation',
      '## 💡 Key Insights',
      '## 🎯 Recommendations',
      '## 🎉 Conclusion',
    ]);
  });
});
