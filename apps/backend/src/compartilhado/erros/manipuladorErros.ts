/**
 * Middleware de tratamento de erros da API.
 *
 * Contrato:
 * - `ErroAplicacao` e serializado como esta (codigo/estado/detalhes).
 * - Erros nao esperados sao registrados (exceto em testes) e viram 500.
 *
 * O formato do envelope faz parte do contrato publico da API.
 */
import type { NextFunction, Request, Response } from 'express';
import { ErroAplicacao } from './erroAplicacao';
import { logError } from '../../infraestrutura/logging/logger';
import { obterIdRegistrado } from '../observabilidade/middlewareObservabilidade';

function propriedade(erro: unknown, chave: string): unknown {
  if (typeof erro !== 'object' || erro === null || !(chave in erro)) return undefined;
  return Reflect.get(erro, chave);
}

function ehErroIdInvalido(erro: unknown): boolean {
  const nome = propriedade(erro, 'name');
  return nome === 'CastError' || nome === 'BSONError';
}

function obterStatusETipo(erro: unknown): { status: unknown; type: unknown } {
  return { status: propriedade(erro, 'status') ?? propriedade(erro, 'statusCode'), type: propriedade(erro, 'type') };
}

function ehPayloadGrandeDemais(erro: unknown): boolean {
  const { status, type } = obterStatusETipo(erro);
  return status === 413 || type === 'entity.too.large';
}

function ehJsonMalformado(erro: unknown): boolean {
  const { status, type } = obterStatusETipo(erro);
  return status === 400 && type === 'entity.parse.failed';
}

function responderErroSimples(res: Response, status: number, codigo: string, mensagem: string) {
  res.status(status).json({
    error: {
      codigo,
      mensagem
    }
  });
}

export function manipuladorErros(erro: unknown, req: Request, res: Response, _next: NextFunction) {
  void _next;

  if (ehErroIdInvalido(erro)) {
    responderErroSimples(res, 400, 'DADOS_INVALIDOS', 'Id invalido');
    return;
  }

  if (ehPayloadGrandeDemais(erro)) {
    responderErroSimples(res, 413, 'PAYLOAD_GRANDE_DEMAIS', 'Payload grande demais');
    return;
  }

  if (ehJsonMalformado(erro)) {
    responderErroSimples(res, 400, 'JSON_INVALIDO', 'Corpo JSON malformado');
    return;
  }

  if (erro instanceof ErroAplicacao) {
    if (erro.estadoHttp >= 500) {
      logError('Erro controlado 5xx na requisicao', erro, {
        requestId: obterIdRegistrado(res),
        route: req.path,
        method: req.method,
        status: erro.estadoHttp,
        codigo: erro.codigo
      });
    }

    res.status(erro.estadoHttp).json({
      error: {
        codigo: erro.codigo,
        mensagem: erro.message,
        detalhes: erro.detalhes
      }
    });
    return;
  }

  logError('Erro nao controlado na requisicao', erro, {
    requestId: obterIdRegistrado(res),
    route: req.path,
    method: req.method
  });

  const exporMensagem = process.env.NODE_ENV !== 'production';
  const mensagem = exporMensagem && erro instanceof Error ? erro.message : 'Erro interno';
  responderErroSimples(res, 500, 'ERRO_INTERNO', mensagem);
}
