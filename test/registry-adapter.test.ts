import { describe, expect, it } from 'vitest';

import { toDashDistribution } from '../src/registry-adapter';
import { normalizePackageDescriptor } from '../src/resources/definitions';
import { PACKAGE_RESOURCES } from '../src/package-info';

describe('toDashDistribution', () => {
  it('projects the bundled resource table', () => {
    const descriptor = normalizePackageDescriptor({
      name: 'dash_share',
      resourceDir: '/srv/app/deps',
      version: '0.0.1',
      resources: PACKAGE_RESOURCES
    });

    expect(toDashDistribution(descriptor)).toEqual({
      _js_dist: [
        { relative_package_path: 'dash_share.min.js', namespace: 'dash_share' },
        {
          relative_package_path: 'dash_share.min.js.map',
          namespace: 'dash_share',
          dynamic: true
        }
      ],
      _css_dist: []
    });
  });

  it('splits stylesheets from scripts and keeps order', () => {
    const descriptor = normalizePackageDescriptor({
      name: 'dash_share',
      resourceDir: '/srv/app/deps',
      version: '0.0.1',
      resources: [
        { relativePath: 'theme.css', kind: 'stylesheet' },
        {
          relativePath: 'vendor.js',
          externalUrl: 'https://cdn.example.com/vendor.js',
          async: true,
          kind: 'script'
        },
        { relativePath: 'print.css', kind: 'stylesheet' }
      ]
    });

    const distribution = toDashDistribution(descriptor);

    expect(distribution._css_dist).toEqual([
      { relative_package_path: 'theme.css', namespace: 'dash_share' },
      { relative_package_path: 'print.css', namespace: 'dash_share' }
    ]);
    expect(distribution._js_dist).toEqual([
      {
        relative_package_path: 'vendor.js',
        namespace: 'dash_share',
        external_url: 'https://cdn.example.com/vendor.js',
        async: true
      }
    ]);
  });

  it('omits false load hints entirely', () => {
    const descriptor = normalizePackageDescriptor({
      name: 'dash_share',
      resourceDir: '/srv/app/deps',
      version: '0.0.1',
      resources: [{ relativePath: 'dash_share.min.js', kind: 'script' }]
    });

    const [entry] = toDashDistribution(descriptor)._js_dist;

    expect(Object.keys(entry ?? {})).toEqual([
      'relative_package_path',
      'namespace'
    ]);
  });
});
