/**
 * Cria a app HTTP (Express) do backend.
 *
 * Principios:
 * - Seguranca por padrao (cabecalhos, sanitizacao, rate-limit).
 * - Validacao nos modulos (Zod) e envelope de erro consistente.
 * - Sem efeitos colaterais ao importar: dependencias entram por parametro.
 */
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { configuracao } from './configuracao';
import { criarRouterApi, type DependenciasApi } from './rotas';
import { manipuladorErros } from './compartilhado/erros/manipuladorErros';
import {
  middlewareIdSolicitacao,
  middlewareRegistroSolicitacao
} from './compartilhado/observabilidade/middlewareObservabilidade';
import { sanitizarMongo } from './infraestrutura/seguranca/sanitizarMongo';

export function criarApp(dependencias: DependenciasApi = {}) {
  const app = express();

  app.disable('x-powered-by');

  app.use(helmet());
  app.use(cors({ origin: configuracao.corsOrigens }));
  app.use(express.json({ limit: configuracao.limiteJson }));
  app.use(sanitizarMongo());
  app.use(middlewareIdSolicitacao);
  app.use(middlewareRegistroSolicitacao);
  app.use(
    rateLimit({
      windowMs: configuracao.rateLimitWindowMs,
      limit: configuracao.rateLimitLimit,
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req) => req.path.startsWith('/api/saude')
    })
  );

  app.use('/api', criarRouterApi(dependencias));

  app.use(manipuladorErros);

  return app;
}
