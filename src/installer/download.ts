import fs from 'fs';
import https from 'https';
import { pipeline } from 'stream/promises';
import { errorMessage, InstallError } from '../errors';

export interface Downloader {
  download(url: string, dest: string): Promise<void>;
}

export interface DownloadResponse extends NodeJS.ReadableStream {
  statusCode?: number;
  headers: { location?: string };
}

export interface DownloadRequest {
  on(event: 'error', listener: (error: Error) => void): unknown;
}

export type HttpGet = (url: string, callback: (response: DownloadResponse) => void) => DownloadRequest;

export const MAX_REDIRECTS = 5;

export function createHttpsDownloader(get: HttpGet = https.get, maxRedirects = MAX_REDIRECTS): Downloader {
  return {
    download(url: string, dest: string): Promise<void> {
      return new Promise((resolve, reject) => {
        const fail = (message: string) => {
          removePartial(dest);
          reject(new InstallError(message));
        };

        const request = (currentUrl: string, redirectCount: number) => {
          if (redirectCount > maxRedirects) {
            fail('Too many redirects');
            return;
          }

          // https.get throws synchronously on a non-https URL
          try {
            get(currentUrl, (response) => {
              const status = response.statusCode ?? 0;
              const location = response.headers.location;

              if (status >= 300 && status < 400 && location) {
                response.resume();
                follow(location, currentUrl, redirectCount);
                return;
              }

              if (status !== 200) {
                response.resume();
                fail(`Failed to download: HTTP ${status}`);
                return;
              }

              pipeline(response, fs.createWriteStream(dest)).then(
                () => resolve(),
                (error: unknown) => fail(`Failed to download: ${errorMessage(error)}`),
              );
            }).on('error', (error) => fail(`Failed to download: ${error.message}`));
          } catch (error) {
            fail(`Failed to download: ${errorMessage(error)}`);
          }
        };

        const follow = (location: string, currentUrl: string, redirectCount: number) => {
          let next: string;
          try {
            next = new URL(location, currentUrl).toString();
          } catch (error) {
            fail(`Failed to download: ${errorMessage(error)}`);
            return;
          }
          request(next, redirectCount + 1);
        };

        request(url, 0);
      });
    },
  };
}

function removePartial(dest: string): void {
  if (fs.existsSync(dest)) {
    fs.unlinkSync(dest);
  }
}
