import { describe, it, expect } from 'vitest';
import {
  behaviorContract,
  connectorContract,
  contractsEqual,
  describeContract,
  isStageConnector,
  terminatorContract,
} from './contract.js';
import { defineContext, terminatingContextOf } from './context.js';
import { ContractMismatchError } from '../utils/errors.js';

interface IncomingContext {
  body: string;
}

interface LogicalContext {
  type: string;
}

const Incoming = defineContext<IncomingContext>('Incoming');
const Logical = defineContext<LogicalContext>('Logical');

describe('defineContext', () => {
  it('should create distinct shapes for the same name', () => {
    const a = defineContext<IncomingContext>('Same');
    const b = defineContext<IncomingContext>('Same');

    expect(a).not.toBe(b);
    expect(a.name).toBe(b.name);
  });

  it('should create a terminating marker', () => {
    const marker = terminatingContextOf(Incoming);

    expect(marker.name).toBe('Terminating<Incoming>');
    expect(marker.terminal).toBe(true);
    expect(terminatingContextOf(Incoming)).toBe(marker);
  });

  it('should not terminate a terminating marker', () => {
    const marker = terminatingContextOf(Incoming);

    expect(() => terminatingContextOf(marker)).toThrow(ContractMismatchError);
  });

  it('should freeze shapes', () => {
    expect(Object.isFrozen(Incoming)).toBe(true);
  });
});

describe('contracts', () => {
  it('should describe an ordinary behavior', () => {
    const contract = behaviorContract(Incoming);

    expect(contract.kind).toBe('behavior');
    expect(contract.input).toBe(Incoming);
    expect(contract.output).toBe(Incoming);
    expect(isStageConnector(contract)).toBe(false);
  });

  it('should describe a stage connector', () => {
    const contract = connectorContract(Incoming, Logical);

    expect(contract.kind).toBe('connector');
    expect(contract.input).toBe(Incoming);
    expect(contract.output).toBe(Logical);
    expect(isStageConnector(contract)).toBe(true);
  });

  it('should describe a terminator', () => {
    const contract = terminatorContract(Logical);

    expect(contract.kind).toBe('terminator');
    expect(contract.output).toBe(terminatingContextOf(Logical));
    expect(isStageConnector(contract)).toBe(true);
  });

  it('should reject a connector that keeps the shape', () => {
    expect(() => connectorContract(Incoming, Incoming)).toThrow(
      "Stage connector must change the context shape, got 'Incoming' on both sides"
    );
  });

  it('should reject terminating markers as inputs', () => {
    const marker = terminatingContextOf(Incoming);

    expect(() => behaviorContract(marker)).toThrow(ContractMismatchError);
    expect(() => connectorContract(marker, Logical)).toThrow(ContractMismatchError);
  });

  it('should compare contracts by kind and shapes', () => {
    expect(contractsEqual(behaviorContract(Incoming), behaviorContract(Incoming))).toBe(true);
    expect(contractsEqual(behaviorContract(Incoming), behaviorContract(Logical))).toBe(false);
    expect(contractsEqual(connectorContract(Incoming, Logical), connectorContract(Logical, Incoming))).toBe(false);
  });

  it('should format contracts for messages', () => {
    expect(describeContract(connectorContract(Incoming, Logical))).toBe('connector(Incoming -> Logical)');
    expect(describeContract(terminatorContract(Incoming))).toBe('terminator(Incoming -> Terminating<Incoming>)');
  });
});
