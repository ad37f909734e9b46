/**
 * Source evaluated inside the sandbox context before the first step. Helpers
 * are defined in the context's own realm so step code never holds a host
 * function or prototype.
 */
export const HELPERS_SOURCE = `
(function (global) {
  var logs = [];

  function pluck(values, key) {
    if (!Array.isArray(values)) throw new TypeError('expected an array of values');
    if (key === undefined) return values;
    return values.map(function (v) { return v === null || v === undefined ? undefined : v[key]; });
  }

  function numbers(values, key) {
    return pluck(values, key).filter(function (v) { return typeof v === 'number' && !Number.isNaN(v); });
  }

  global.dataset = JSON.parse(global.__datasetJson);
  delete global.__datasetJson;

  global.sum = function (values, key) {
    return numbers(values, key).reduce(function (a, b) { return a + b; }, 0);
  };
  global.mean = function (values, key) {
    var nums = numbers(values, key);
    return nums.length === 0 ? null : nums.reduce(function (a, b) { return a + b; }, 0) / nums.length;
  };
  global.count = function (values, predicate) {
    if (!Array.isArray(values)) throw new TypeError('expected an array of values');
    return predicate ? values.filter(predicate).length : values.length;
  };
  global.min = function (values, key) {
    var nums = numbers(values, key);
    return nums.length === 0 ? null : nums.reduce(function (a, b) { return b < a ? b : a; });
  };
  global.max = function (values, key) {
    var nums = numbers(values, key);
    return nums.length === 0 ? null : nums.reduce(function (a, b) { return b > a ? b : a; });
  };
  global.groupBy = function (rows, key) {
    var groups = {};
    pluck(rows).forEach(function (row) {
      var group = String(row === null || row === undefined ? null : row[key]);
      (groups[group] = groups[group] || []).push(row);
    });
    return groups;
  };
  global.sortBy = function (rows, key, direction) {
    var sign = direction === 'desc' ? -1 : 1;
    return pluck(rows).slice().sort(function (a, b) {
      var x = a[key], y = b[key];
      if (x === y) return 0;
      if (x === null || x === undefined) return 1;
      if (y === null || y === undefined) return -1;
      return (x < y ? -1 : 1) * sign;
    });
  };
  global.pick = function (rows, keys) {
    return pluck(rows).map(function (row) {
      var picked = {};
      keys.forEach(function (k) { picked[k] = row[k] === undefined ? null : row[k]; });
      return picked;
    });
  };
  global.round = function (value, digits) {
    var factor = Math.pow(10, digits === undefined ? 2 : digits);
    return Math.round(value * factor) / factor;
  };
  global.divide = function (a, b) {
    if (b === 0) throw new RangeError('division by zero');
    return a / b;
  };
  global.console = {
    log: function () {
      logs.push(Array.prototype.map.call(arguments, function (a) {
        return typeof a === 'string' ? a : JSON.stringify(a);
      }).join(' '));
    },
  };
  Object.defineProperty(global, '__drainLogs', {
    value: function () { return JSON.stringify(logs.splice(0)); },
    enumerable: false,
  });
})(this);
`;

/**
 * CommonJS program run by each sandbox worker (eval'd, so it needs no build
 * output on disk). Posts a `step` message before every step and exactly one
 * `success` or `fault` message.
 */
export const WORKER_SOURCE = `
const { parentPort, workerData } = require('worker_threads');
const vm = require('vm');

const IDENTIFIER = /^[A-Za-z_$][\\w$]*$/;

function fault(kind, message, stepIndex) {
  parentPort.postMessage({ type: 'fault', error: { kind: kind, message: message, stepIndex: stepIndex } });
}

function describe(err) {
  if (err !== null && typeof err === 'object' && typeof err.name === 'string') {
    return { name: err.name, message: String(err.message), code: err.code };
  }
  return { name: 'Error', message: String(err), code: undefined };
}

function timeoutMessage() {
  return 'Execution exceeded ' + workerData.timeoutMs + 'ms';
}

function run() {
  const deadline = Date.now() + workerData.timeoutMs;
  const context = vm.createContext(Object.create(null), { codeGeneration: { strings: false, wasm: false } });
  context.__datasetJson = workerData.datasetJson;
  vm.runInContext(workerData.helpers, context, { filename: 'helpers.js' });

  const outputs = {};
  let last = null;

  for (let i = 0; i < workerData.steps.length; i++) {
    const step = workerData.steps[i];
    const index = i + 1;
    parentPort.postMessage({ type: 'step', index: index });

    if (!IDENTIFIER.test(step.output)) {
      return fault('invalid_plan', 'Step ' + index + ' names an invalid output variable "' + step.output + '"', index);
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) return fault('timeout', timeoutMessage(), index);

    try {
      vm.runInContext(step.code, context, { filename: 'step-' + index + '.js', timeout: remaining });
    } catch (err) {
      const info = describe(err);
      if (info.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT') return fault('timeout', timeoutMessage(), index);
      return fault(info.name, info.message, index);
    }

    let serialized;
    try {
      const defined = vm.runInContext('typeof ' + step.output + " !== 'undefined'", context);
      if (defined !== true) {
        return fault('MissingOutput', 'Step ' + index + ' did not define "' + step.output + '"', index);
      }
      serialized = vm.runInContext('JSON.stringify(' + step.output + ')', context, {
        timeout: Math.max(1, deadline - Date.now()),
      });
    } catch (err) {
      const info = describe(err);
      if (info.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT') return fault('timeout', timeoutMessage(), index);
      return fault('invalid_output', 'Output of step ' + index + ' is not serializable: ' + info.message, index);
    }

    if (typeof serialized !== 'string') {
      return fault('invalid_output', 'Output of step ' + index + ' is not a JSON value', index);
    }
    last = JSON.parse(serialized);
    outputs[step.output] = last;
  }

  let logs = [];
  try {
    logs = JSON.parse(vm.runInContext('__drainLogs()', context, { timeout: 100 }));
  } catch (err) {
    logs = [];
  }

  parentPort.postMessage({ type: 'success', value: last, outputs: outputs, logs: logs });
}

try {
  run();
} catch (err) {
  fault('worker_crashed', describe(err).message, null);
}
`;
