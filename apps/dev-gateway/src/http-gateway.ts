/**
 * HTTP API Gateway
 *
 * 模拟 AWS API Gateway 的行为：
 * - 把 HTTP 请求转换为 APIGatewayProxyEvent 并在进程内调用 handler
 * - 提供 /static/* 前端文件
 * - 记录请求耗时
 */

import * as crypto from 'node:crypto';
import * as http from 'node:http';
import type { APIGatewayProxyEvent, APIGatewayProxyResult, Context } from 'aws-lambda';
import { createActivitiesHandler, type ActivitiesHandler } from '@activity-signup/activities-api';
import { ActivityRegistry, loadDefaultSeed, loadSeedFile } from '@activity-signup/activities-core';
import { STATIC_PREFIX, serveStatic } from './static-files';
import { RequestTimer, clearTimingLog } from './timing-logger';
import type { GatewayConfig } from './types';

/**
 * 读取请求体
 */
function readRequestBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk) => chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)));
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    req.on('error', reject);
  });
}

/**
 * 解析查询字符串（值已解码）
 */
function parseQueryString(searchParams: URLSearchParams): {
  single: Record<string, string>;
  multi: Record<string, string[]>;
} | null {
  const grouped = new Map<string, string[]>();
  for (const [key, value] of searchParams) {
    grouped.set(key, [...(grouped.get(key) ?? []), value]);
  }
  if (grouped.size === 0) return null;
  // fromEntries 保留 "__proto__" 之类的键
  return {
    single: Object.fromEntries([...grouped].map(([key, values]): [string, string] => [key, values[values.length - 1]])),
    multi: Object.fromEntries(grouped),
  };
}

/**
 * 转换请求头
 */
function convertHeaders(req: http.IncomingMessage): {
  single: Record<string, string>;
  multi: Record<string, string[]>;
} {
  const single: Record<string, string> = {};
  const multi: Record<string, string[]> = {};
  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    const values = Array.isArray(value) ? value : [value];
    single[key] = values[0];
    multi[key] = values;
  }
  return { single, multi };
}

/**
 * 构建 API Gateway 事件
 */
export function buildProxyEvent(
  req: http.IncomingMessage,
  url: URL,
  body: string,
  requestId: string
): APIGatewayProxyEvent {
  const method = req.method || 'GET';
  const headers = convertHeaders(req);
  const query = parseQueryString(url.searchParams);

  return {
    httpMethod: method,
    path: url.pathname,
    headers: headers.single,
    multiValueHeaders: headers.multi,
    queryStringParameters: query?.single ?? null,
    multiValueQueryStringParameters: query?.multi ?? null,
    pathParameters: null, // 由 Lambda 路由解析
    stageVariables: null,
    body: body || null,
    isBase64Encoded: false,
    resource: url.pathname,
    requestContext: {
      accountId: 'local',
      apiId: 'dev-gateway',
      authorizer: null,
      protocol: `HTTP/${req.httpVersion}`,
      httpMethod: method,
      identity: {
        accessKey: null,
        accountId: null,
        apiKey: null,
        apiKeyId: null,
        caller: null,
        clientCert: null,
        cognitoAuthenticationProvider: null,
        cognitoAuthenticationType: null,
        cognitoIdentityId: null,
        cognitoIdentityPoolId: null,
        principalOrgId: null,
        sourceIp: req.socket.remoteAddress ?? '127.0.0.1',
        user: null,
        userAgent: headers.single['user-agent'] ?? null,
        userArn: null,
      },
      path: url.pathname,
      stage: 'local',
      requestId,
      requestTimeEpoch: Date.now(),
      resourceId: 'dev-gateway',
      resourcePath: url.pathname,
    },
  };
}

/**
 * 创建最小 Lambda context
 */
export function createLambdaContext(requestId: string): Context {
  return {
    callbackWaitsForEmptyEventLoop: false,
    functionName: 'activities-api',
    functionVersion: '$LATEST',
    invokedFunctionArn: 'arn:aws:lambda:local:000000000000:function:activities-api',
    memoryLimitInMB: '512',
    awsRequestId: requestId,
    logGroupName: '/aws/lambda/activities-api',
    logStreamName: `dev-gateway-${Date.now()}`,
    getRemainingTimeInMillis: () => 30_000,
    done: () => {},
    fail: () => {},
    succeed: () => {},
  };
}

function responseHeaders(result: APIGatewayProxyResult, requestId: string): Record<string, string> {
  const headers: Record<string, string> = { 'X-Request-Id': requestId };
  for (const [key, value] of Object.entries(result.headers ?? {})) {
    headers[key] = String(value);
  }
  return headers;
}

/**
 * 创建 HTTP API Gateway
 */
export function createHttpGateway(config: GatewayConfig, handler: ActivitiesHandler): http.Server {
  const server = http.createServer(async (req, res) => {
    const requestId = crypto.randomUUID();

    // 解析 URL
    const url = new URL(req.url || '/', `http://localhost:${config.port}`);
    const pathname = url.pathname;
    const method = req.method || 'GET';

    // 创建计时器
    const timer = new RequestTimer(requestId, method, pathname, config.timingLogFile);

    console.log(`[HTTP] ${method} ${pathname}`);

    try {
      // 静态文件
      if (pathname.startsWith(STATIC_PREFIX) && (method === 'GET' || method === 'HEAD')) {
        const status = await serveStatic(res, config.staticDir, pathname, method);
        timer.mark('serve_static');
        timer.finish(status);
        return;
      }

      // 读取请求体
      const body = await readRequestBody(req);
      timer.mark('read_body');

      const event = buildProxyEvent(req, url, body, requestId);
      timer.mark('build_event');

      // 调用 Lambda
      const result = await handler(event, createLambdaContext(requestId));
      timer.mark('lambda_invoke');

      res.writeHead(result.statusCode, responseHeaders(result, requestId));
      res.end(method === 'HEAD' ? undefined : result.body);
      timer.mark('send_response');

      timer.finish(result.statusCode);
    } catch (err) {
      console.error(`[HTTP] Error handling ${method} ${pathname}:`, err);
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'application/json' });
      }
      res.end(JSON.stringify({ detail: 'Internal server error', requestId }));
      timer.finish(500);
    }
  });

  return server;
}

/**
 * Build the registry and start listening
 */
export function startGateway(config: GatewayConfig): http.Server {
  const seed = config.seedFile ? loadSeedFile(config.seedFile) : loadDefaultSeed();
  const registry = new ActivityRegistry(seed, { enforceCapacity: config.enforceCapacity });

  if (config.timingLogFile) {
    clearTimingLog(config.timingLogFile);
  }

  const server = createHttpGateway(config, createActivitiesHandler(registry));

  server.listen(config.port, () => {
    console.log(`✅ Gateway listening on http://localhost:${config.port}`);
    console.log(`   Front-end:  http://localhost:${config.port}/static/index.html`);
    console.log(`   Activities: ${registry.size} loaded`);
    console.log('');
  });

  return server;
}
