/**
 * Remove de body, query e params as chaves que o MongoDB interpretaria como
 * operador (`$gt`, `$where`) ou caminho (`a.b`).
 *
 * No Express 5 `req.query` e um getter: o objeto e limpo no lugar, sem
 * reatribuicao.
 */
import type { NextFunction, Request, Response } from 'express';

const CHAVES_PROIBIDAS = new Set(['__proto__', 'prototype', 'constructor']);

function ehObjetoSimples(valor: unknown): valor is Record<string, unknown> {
  if (typeof valor !== 'object' || valor === null) return false;
  return Object.prototype.toString.call(valor) === '[object Object]';
}

function ehChavePerigosa(chave: string): boolean {
  return CHAVES_PROIBIDAS.has(chave) || chave.startsWith('$') || chave.includes('.');
}

export function sanitizarNoLugar(valor: unknown): void {
  if (Array.isArray(valor)) {
    for (const item of valor) sanitizarNoLugar(item);
    return;
  }
  if (!ehObjetoSimples(valor)) return;

  for (const chave of Object.keys(valor)) {
    if (ehChavePerigosa(chave)) {
      delete valor[chave];
      continue;
    }
    sanitizarNoLugar(valor[chave]);
  }
}

export function sanitizarMongo() {
  return (req: Request, _res: Response, next: NextFunction) => {
    sanitizarNoLugar(req.body);
    sanitizarNoLugar(req.query);
    sanitizarNoLugar(req.params);
    next();
  };
}
