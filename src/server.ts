import 'reflect-metadata';
import {serve} from '@hono/node-server';
import {config} from 'dotenv';
import {loadEnvironment} from './config/environment';
import app from './index';

// .env を process.env に読み込む
// 環境変数はリクエスト時（app-initializer）にも読むので、listen より前に済ませる
config();

const env = loadEnvironment();

serve(
    {
        fetch: app.fetch,
        port: env.PORT,
        hostname: env.HOST,
    },
    (info) => {
        console.log(`🏦 Retail Bank API listening on http://${env.HOST}:${String(info.port)}`);
    }
);
