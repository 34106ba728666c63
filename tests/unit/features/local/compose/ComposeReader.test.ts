/**
 * Tests for the compose-file reader
 */

import { describe, it, expect } from 'vitest';
import {
  getServiceEnvironment,
  getServiceImage,
  parseCompose,
} from '../../../../../src/features/local/compose/ComposeReader.js';
import {
  ComposeDecodeError,
  ServiceNotFoundError,
} from '../../../../../src/shared/utils/errors.js';

const COMPOSE = `
version: '3.7'
services:
  postgres:
    image: postgres:13
    environment:
      - POSTGRES_USER=airflow
      - POSTGRES_PASSWORD=airflow
    logging:
      options:
        max-size: 10m
  local-runner:
    image: amazon/mwaa-local:2_10_3
    environment:
      LOAD_EX: n
      PORT: 8080
      DEBUG: false
      EMPTY:
  sidecar:
`;

describe('parseCompose', () => {
  it('should read images and list-form environments', () => {
    const compose = parseCompose(COMPOSE);
    expect(getServiceImage(compose, 'postgres')).toBe('postgres:13');
    expect(getServiceEnvironment(compose, 'postgres')).toEqual([
      'POSTGRES_USER=airflow',
      'POSTGRES_PASSWORD=airflow',
    ]);
  });

  it('should normalize map-form environments to KEY=VALUE', () => {
    const compose = parseCompose(COMPOSE);
    expect(getServiceEnvironment(compose, 'local-runner')).toEqual([
      'LOAD_EX=n',
      'PORT=8080',
      'DEBUG=false',
      'EMPTY=',
    ]);
  });

  it('should accept a service without a body', () => {
    const compose = parseCompose(COMPOSE);
    expect(getServiceEnvironment(compose, 'sidecar')).toEqual([]);
  });

  it('should fail on a service without an image', () => {
    const compose = parseCompose(COMPOSE);
    expect(() => getServiceImage(compose, 'sidecar')).toThrow(ComposeDecodeError);
  });

  it('should fail on an absent service', () => {
    const compose = parseCompose(COMPOSE);
    expect(() => getServiceImage(compose, 'redis')).toThrow(ServiceNotFoundError);
    expect(() => getServiceEnvironment(compose, 'toString')).toThrow('service toString not found');
  });

  it('should treat an empty document as having no services', () => {
    expect(parseCompose('')).toEqual({ services: {} });
  });

  it('should reject undecodable YAML', () => {
    expect(() => parseCompose('services: [unclosed')).toThrow(ComposeDecodeError);
  });

  it('should reject a structurally wrong document', () => {
    expect(() => parseCompose('services:\n  postgres:\n    image: [1, 2]\n')).toThrow(
      'invalid compose document at services.postgres.image'
    );
  });
});
