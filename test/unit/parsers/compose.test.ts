import { describe, it, expect } from 'vitest';
import { parseCompose } from '../../../src/parsers/compose.js';
import { ManifestError } from '../../../src/errors.js';

describe('parseCompose', () => {
  describe('services', () => {
    it('should list services in file order with their image and line', () => {
      const raw = `services:
  web:
    # tagwatch --pattern "<>.<>-alpine"
    image: nginx:1.25-alpine
  db:
    image: postgres:16
`;
      const result = parseCompose(raw, '/test/docker-compose.yml');

      expect(result.path).toBe('/test/docker-compose.yml');
      expect(result.services).toEqual([
        { name: 'web', image: 'nginx:1.25-alpine', imageLine: 4, directive: { pattern: '<>.<>-alpine' } },
        { name: 'db', image: 'postgres:16', imageLine: 6, directive: undefined },
      ]);
    });

    it('should skip blank lines between the directive and the image', () => {
      const raw = `services:
  web:
    # tagwatch --pattern "<>"

    image: nginx:1
`;
      const result = parseCompose(raw, '/test/docker-compose.yml');

      expect(result.services[0].directive).toEqual({ pattern: '<>' });
    });

    it('should read string and object build definitions', () => {
      const raw = `services:
  app:
    build: ./app
  api:
    build:
      context: ./api
      dockerfile: Dockerfile.prod
  worker:
    build:
      dockerfile: worker.Dockerfile
`;
      const result = parseCompose(raw, '/test/docker-compose.yml');

      expect(result.services.map((s) => s.build)).toEqual([
        { context: './app' },
        { context: './api', dockerfile: 'Dockerfile.prod' },
        { context: '.', dockerfile: 'worker.Dockerfile' },
      ]);
    });

    it('should anchor the directive on the image key when the value is on the next line', () => {
      const raw = `services:
  app:
    # tagwatch --pattern "<>"
    image:
      node:20
`;
      const result = parseCompose(raw, '/test/docker-compose.yml');

      expect(result.services).toEqual([
        { name: 'app', image: 'node:20', imageLine: 4, directive: { pattern: '<>' } },
      ]);
    });

    it('should ignore a version field', () => {
      const raw = `version: "3.8"
services:
  web:
    image: nginx
`;
      expect(parseCompose(raw, '/test/docker-compose.yml')).toEqual({
        path: '/test/docker-compose.yml',
        services: [{ name: 'web', image: 'nginx', imageLine: 4, directive: undefined }],
      });
    });
  });

  describe('errors', () => {
    it('should fail when services is missing', () => {
      expect(() => parseCompose('no: services\n', '/test/c.yml')).toThrow('/test/c.yml has no `services` section');
    });

    it('should fail when services is not a mapping', () => {
      const raw = `services:
  - web
  - db
`;
      expect(() => parseCompose(raw, '/test/c.yml')).toThrow('The `services` section of /test/c.yml must be a mapping');
    });

    it('should fail on invalid YAML', () => {
      expect(() => parseCompose('services: [web\n', '/test/c.yml')).toThrow(ManifestError);
    });

    it('should fail when an image is not a string', () => {
      const raw = `services:
  web:
    image: 5
`;
      expect(() => parseCompose(raw, '/test/c.yml')).toThrow('The image of service `web` must be a string');
    });

    it('should fail on an unsupported build definition', () => {
      const raw = `services:
  web:
    build: 42
`;
      expect(() => parseCompose(raw, '/test/c.yml')).toThrow('The build definition of service `web` is not supported');
    });
  });
});
