import { createReadStream, createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import { createGunzip } from 'node:zlib';

import { extract as tarExtract } from 'tar-stream';

export type ArchiveKind = 'tar' | 'tar.gz';

export function archiveKindOf(fileName: string): ArchiveKind | undefined {
  if (fileName.endsWith('.tar.gz') || fileName.endsWith('.tgz')) {
    return 'tar.gz';
  }
  if (fileName.endsWith('.tar')) {
    return 'tar';
  }
  return undefined;
}

/**
 * Unpacks a tar archive into `destination` and returns the names of the files it contained. Entries that would
 * land outside `destination` are skipped.
 */
export async function extractTarArchive(archivePath: string, destination: string, kind: ArchiveKind): Promise<string[]> {
  const root = path.resolve(destination);
  const extract = tarExtract();
  const extracted: string[] = [];

  await new Promise<void>((resolve, reject) => {
    extract.on('entry', (header, stream, next) => {
      const target = path.resolve(root, header.name);
      if (!target.startsWith(`${root}${path.sep}`) || (header.type !== 'file' && header.type !== 'directory')) {
        stream.resume();
        next();
        return;
      }

      if (header.type === 'directory') {
        mkdir(target, { recursive: true }).then(() => {
          stream.resume();
          next();
        }, reject);
        return;
      }

      extracted.push(header.name);
      mkdir(path.dirname(target), { recursive: true }).then(() => {
        const output = createWriteStream(target);
        stream.pipe(output);
        output.on('finish', () => next());
        output.on('error', reject);
        stream.on('error', reject);
      }, reject);
    });
    extract.on('finish', resolve);
    extract.on('error', reject);

    const source = createReadStream(archivePath);
    source.on('error', reject);
    if (kind === 'tar.gz') {
      const gunzip = createGunzip();
      gunzip.on('error', reject);
      source.pipe(gunzip).pipe(extract);
    } else {
      source.pipe(extract);
    }
  });

  return extracted;
}

export async function gunzipFile(source: string, target: string): Promise<void> {
  await pipeline(createReadStream(source), createGunzip(), createWriteStream(target));
}
