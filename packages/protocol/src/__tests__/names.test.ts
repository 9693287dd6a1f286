/**
 * External Name Tests
 */

import { describe, it, expect } from 'vitest';
import { ExternalName } from '../index.js';

describe('ExternalName', () => {
  describe('parse', () => {
    it('should round-trip canonical names', () => {
      const text = 'org.example-org.victory-truly-handicaps';
      expect(ExternalName.parse(text).toString()).toBe(text);
    });

    it('should lower-case words', () => {
      expect(ExternalName.parse('Slap-Me.Up').toString()).toBe('slap-me.up');
    });

    it('should keep slashes between words', () => {
      expect(ExternalName.parse('the-head.my-i/e/t/f-index').toString()).toBe('the-head.my-i/e/t/f-index');
    });

    it('should reject empty components', () => {
      expect(() => ExternalName.parse('a..b')).toThrow(SyntaxError);
      expect(() => ExternalName.parse('')).toThrow(SyntaxError);
    });

    it('should reject words not starting with a letter', () => {
      expect(() => ExternalName.parse('module.1st')).toThrow('Illegal word');
    });

    it('should pass absent input through parseOptional', () => {
      expect(ExternalName.parseOptional(undefined)).toBeUndefined();
      expect(ExternalName.parseOptional('a')?.toString()).toBe('a');
    });
  });

  describe('structure', () => {
    it('should decompose into parent and leaf', () => {
      const name = ExternalName.parse('example.echo.echoer');
      expect(name.isLeaf()).toBe(false);
      expect(name.parent?.toString()).toBe('example.echo');
      expect(name.leaf.toString()).toBe('echoer');
    });

    it('should have no parent for a leaf', () => {
      const name = ExternalName.parse('echoer');
      expect(name.isLeaf()).toBe(true);
      expect(name.parent).toBeUndefined();
      expect(name.leaf).toBe(name);
    });

    it('should resolve children against a parent', () => {
      const parent = ExternalName.parse('example.echo');
      expect(parent.resolve('echoer').toString()).toBe('example.echo.echoer');
      expect(parent.resolve(ExternalName.parse('a.b')).toString()).toBe('example.echo.a.b');
    });

    it('should prefix the leaf only', () => {
      expect(ExternalName.parse('a.b').prefix('get-').toString()).toBe('a.get-b');
      expect(ExternalName.parse('b').prefix('get-').toString()).toBe('get-b');
    });

    it('should compare structurally', () => {
      expect(ExternalName.parse('A.b-C').equals(ExternalName.parse('a.b-c'))).toBe(true);
      expect(ExternalName.parse('a.b-c').equals(ExternalName.parse('a.b/c'))).toBe(false);
      expect(ExternalName.parse('a').equals('a')).toBe(false);
    });
  });

  describe('renderings', () => {
    const name = ExternalName.parse('the-head.my-i/e/t/f-index');

    it('should render class names', () => {
      expect(name.asClassName()).toBe('MyIETFIndex');
      expect(ExternalName.parse('echo-service').asClassName()).toBe('EchoService');
    });

    it('should render method names', () => {
      expect(name.asMethodName()).toBe('myIetfIndex');
      expect(ExternalName.parse('get-status').asMethodName()).toBe('getStatus');
    });

    it('should render constant names', () => {
      expect(ExternalName.parse('max-size').asConstantName()).toBe('MAX_SIZE');
    });

    it('should render path elements', () => {
      expect(ExternalName.parse('org.example-org').asPathElements()).toBe('org/example-org');
      expect(name.asPathElements()).toBe('the-head/my-ietf-index');
    });

    it('should serialize to JSON as its string form', () => {
      expect(JSON.stringify({ name: ExternalName.parse('a.b') })).toBe('{"name":"a.b"}');
    });
  });
});
