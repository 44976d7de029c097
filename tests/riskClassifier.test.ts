import { test } from 'node:test';
import assert from 'node:assert/strict';
import { MODEL_FEATURES, RiskClassifier, toFeatureVector, toPercent } from '../src/services/analytics/riskClassifier.js';
import { deriveLabel, explainRisk } from '../src/services/analytics/riskRules.js';
import { RISK_LABELS } from '../src/services/analytics/types.js';
import { makeRow } from './helpers.js';

function benignRows(count: number) {
  return Array.from({ length: count }, (_, i) => makeRow({ source: `benign_${i}.json`, timestamp: i }));
}

test('Training label rule', () => {
  assert.equal(deriveLabel('VIOLATION:execve'), 'Malicious');
  assert.equal(deriveLabel('SIGNALED(9)'), 'Buggy');
  assert.equal(deriveLabel('EXITED(0)'), 'Benign');
  assert.equal(deriveLabel('EXITED(1)'), 'Benign');
  assert.equal(deriveLabel('SIGNALED(31) after VIOLATION'), 'Malicious');
});

test('Explanation rules', async (t) => {
  await t.test('reports normal behavior when no rule fires', () => {
    assert.equal(explainRisk(makeRow()), 'Normal behavior');
  });

  await t.test('thresholds are strict', () => {
    assert.equal(explainRisk(makeRow({ peak_cpu: 80, peak_memory_kb: 100_000, page_faults_minor: 1000 })), 'Normal behavior');
  });

  await t.test('accumulates reasons in a fixed order', () => {
    assert.equal(explainRisk(makeRow({ peak_cpu: 95, exit_reason: 'VIOLATION:execve' })), 'High CPU + Syscall Violation');
    assert.equal(
      explainRisk(makeRow({ peak_cpu: 90, peak_memory_kb: 200_000, page_faults_minor: 5000, exit_reason: 'VIOLATION:socket' })),
      'High CPU + High Memory + High Activity + Syscall Violation'
    );
  });
});

test('Confidence rounding', () => {
  assert.equal(toPercent(1), 100);
  assert.equal(toPercent(0.5), 50);
  assert.equal(toPercent(0.8125), 81.2);
  assert.equal(toPercent(0.6875), 68.8);
});

test('RiskClassifier', async (t) => {
  await t.test('is usable straight after construction', () => {
    const classifier = new RiskClassifier();
    const info = classifier.describe();

    assert.equal(classifier.isTrained, true);
    assert.equal(info.phase, 'seeded');
    assert.equal(info.is_trained, true);
    assert.equal(info.training_rows, 0);
    assert.equal(info.n_estimators, 10);
    assert.deepEqual(info.features, MODEL_FEATURES);
    assert.deepEqual(info.classes, ['Benign', 'Malicious']);

    const result = classifier.predict(makeRow());
    assert.ok(RISK_LABELS.includes(result.prediction));
    assert.ok(result.confidence >= 0 && result.confidence <= 100);
    assert.equal(Math.round(result.confidence * 10) / 10, result.confidence);
    assert.equal(result.reason, 'Normal behavior');
  });

  await t.test('separates the seed archetypes before any real data', () => {
    const classifier = new RiskClassifier();
    const archetype = (runtime_ms: number, peak_cpu: number, peak_memory_kb: number, page_faults_minor: number, page_faults_major: number) =>
      classifier.predict(makeRow({ runtime_ms, peak_cpu, peak_memory_kb, page_faults_minor, page_faults_major })).prediction;

    assert.equal(archetype(10, 5, 200, 10, 0), 'Benign');
    assert.equal(archetype(50, 10, 1024, 50, 0), 'Benign');
    assert.equal(archetype(5000, 99, 1024, 100, 0), 'Malicious');
    assert.equal(archetype(100, 10, 512000, 5000, 10), 'Malicious');
    assert.equal(archetype(200, 30, 400, 10000, 0), 'Malicious');
  });

  await t.test('ignores training batches below the minimum', () => {
    const classifier = new RiskClassifier();
    const probe = makeRow({ runtime_ms: 300, peak_cpu: 60 });
    const before = { info: classifier.describe(), prediction: classifier.predict(probe) };

    assert.equal(classifier.train(benignRows(4)), false);
    assert.deepEqual(classifier.describe(), before.info);
    assert.deepEqual(classifier.predict(probe), before.prediction);
  });

  await t.test('labels a benign-looking run as Benign after training on clean exits', () => {
    const classifier = new RiskClassifier();

    assert.equal(classifier.train(benignRows(6)), true);
    assert.equal(classifier.currentPhase, 'trained');
    assert.equal(classifier.describe().training_rows, 6);

    const heldOut = makeRow({ source: 'held_out.json' });
    assert.equal(classifier.predict(heldOut).prediction, 'Benign');
  });

  await t.test('adds the Buggy class once signaled runs are seen', () => {
    const classifier = new RiskClassifier();
    const signaled = Array.from({ length: 5 }, (_, i) => makeRow({ runtime_ms: 400 + i, exit_reason: 'SIGNALED(11)' }));

    classifier.train(signaled);

    assert.deepEqual(classifier.describe().classes, ['Benign', 'Buggy', 'Malicious']);
  });

  await t.test('bounds the real portion of the training set', () => {
    const classifier = new RiskClassifier({ maxTrainingRows: 5 });

    classifier.train(benignRows(8));

    assert.equal(classifier.describe().training_rows, 5);
  });

  await t.test('explanation is independent of the predicted label', () => {
    const classifier = new RiskClassifier();
    const row = makeRow({ peak_cpu: 95, exit_reason: 'VIOLATION:execve' });

    assert.equal(classifier.predict(row).reason, 'High CPU + Syscall Violation');
    assert.equal(classifier.explain('Benign', row), 'High CPU + Syscall Violation');
    assert.equal(classifier.explain('Malicious', row), 'High CPU + Syscall Violation');
  });

  await t.test('retraining on the same rows is reproducible', () => {
    const rows = [...benignRows(4), makeRow({ runtime_ms: 90, peak_cpu: 97, exit_reason: 'VIOLATION:ptrace' })];
    const first = new RiskClassifier();
    const second = new RiskClassifier();
    first.train(rows);
    second.train(rows);

    const probe = makeRow({ runtime_ms: 80, peak_cpu: 90 });
    assert.deepEqual(first.predict(probe), second.predict(probe));
  });

  await t.test('rejects rows with non-numeric model inputs', () => {
    assert.throws(() => toFeatureVector(makeRow({ runtime_ms: Number.NaN })), /non-numeric/);
    assert.throws(() => new RiskClassifier().predict(makeRow({ peak_cpu: Number.POSITIVE_INFINITY })), /non-numeric/);
  });
});
