import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { google } from 'googleapis';
import * as path from 'path';

const logger = new Logger('GoogleAuth');

/**
 * Builds a GoogleAuth client from the service-account file named by
 * GCP_CREDENTIALS_PATH, or from application default credentials when unset.
 */
export function createGoogleAuth(config: ConfigService, scopes: string[]) {
  const credsPath = config.get<string>('GCP_CREDENTIALS_PATH');
  const keyFile = credsPath ? path.resolve(process.cwd(), credsPath) : undefined;
  logger.log(keyFile ? `Using credentials: ${keyFile}` : 'Using application default credentials');
  return new google.auth.GoogleAuth({ keyFile, scopes });
}
