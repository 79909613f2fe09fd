/**
 * Helpers de validacao com Zod para requisicoes.
 *
 * Ideia:
 * - Validar e normalizar entradas o mais perto possivel da borda HTTP.
 * - Se o schema transforma/coage (strings -> numbers), o restante do codigo
 *   pode assumir tipos corretos.
 */
import type { NextFunction, Request, Response } from 'express';
import type { ZodSchema } from 'zod';
import { ErroAplicacao } from '../erros/erroAplicacao';

export function validarCorpo(schema: ZodSchema) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const resultado = schema.safeParse(req.body);
    if (!resultado.success) {
      next(new ErroAplicacao('VALIDACAO', 'Payload invalido', 400, resultado.error.flatten()));
      return;
    }
    // Importante: `req.body` passa a ser a saida do schema (ja validada).
    req.body = resultado.data;
    next();
  };
}

/**
 * Valida a query string. No Express 5 `req.query` e somente leitura, entao o
 * resultado fica em `res.locals.consulta`.
 */
export function validarConsulta(schema: ZodSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const resultado = schema.safeParse(req.query);
    if (!resultado.success) {
      next(new ErroAplicacao('VALIDACAO', 'Parametros de consulta invalidos', 400, resultado.error.flatten()));
      return;
    }
    res.locals.consulta = resultado.data;
    next();
  };
}
