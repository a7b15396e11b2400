import dotenv from 'dotenv-safe';

// It is necessary that process.env is available in all files.
dotenv.config({ allowEmptyValues: true });

import {} from './types/env';

import { loadSettings } from '~/config';
import { Logger } from '~/logger';
import { createProxyFinder } from '~/proxy_finder';
import { ProxyFinderController } from '~/proxy_finder/controller';
import { Server } from '~/server';

const settings = loadSettings(process.env);

Logger.setLevel(settings.logLevel);

const server = new Server(settings.port);
const controller = new ProxyFinderController(createProxyFinder(settings), settings.validationConcurrency);

controller.getEndpoints()
.forEach((endpoint) => server.addEndpoint(endpoint));

server.start()
.catch((e: unknown) => {
    new Logger('main').error('Failed to start the server:', e);
    process.exitCode = 1;
});
