/**
 * Middlewares de observabilidade: id de correlacao e registro de cada
 * requisicao (log estruturado e metricas).
 */
import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import { log } from '../../infraestrutura/logging/logger';
import { registrarRequisicaoHttp } from './metricas';

function obterIdSolicitacao(req: Request): string {
  const cabecalho = req.header('x-request-id');
  return cabecalho && cabecalho.trim() ? cabecalho.trim() : randomUUID();
}

function obterRota(req: Request): string {
  const base = String(req.baseUrl || '');
  const rota = String(req.route?.path ?? '').trim();
  if (rota) return `${base}${rota}`;
  return String(req.path || '/');
}

export function obterIdRegistrado(res: Response): string | undefined {
  const id: unknown = res.locals.idSolicitacao;
  return typeof id === 'string' ? id : undefined;
}

export function middlewareIdSolicitacao(req: Request, res: Response, next: NextFunction) {
  const idSolicitacao = obterIdSolicitacao(req);
  res.setHeader('x-request-id', idSolicitacao);
  res.locals.idSolicitacao = idSolicitacao;
  next();
}

export function middlewareRegistroSolicitacao(req: Request, res: Response, next: NextFunction) {
  const inicio = Date.now();
  res.on('finish', () => {
    const duracaoMs = Date.now() - inicio;
    const rota = obterRota(req);
    const estado = Number(res.statusCode || 0);

    registrarRequisicaoHttp(req.method, rota, estado, duracaoMs);
    log(estado >= 500 ? 'error' : estado >= 400 ? 'warn' : 'info', 'HTTP request', {
      requestId: obterIdRegistrado(res),
      route: rota,
      method: req.method,
      status: estado,
      durationMs: duracaoMs
    });
  });
  next();
}
