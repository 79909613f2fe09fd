/**
 * Registro central de rotas da API.
 *
 * Sem repositorio (MongoDB nao configurado) a API continua servindo saude,
 * metricas e importacao em modo "somente relatorio"; o banco de questoes
 * responde 503.
 */
import { Router } from 'express';
import { ErroAplicacao } from './compartilhado/erros/erroAplicacao';
import { exportarMetricasPrometheus } from './compartilhado/observabilidade/metricas';
import rotasSaude from './compartilhado/saude/rotasSaude';
import { criarRotasBancoQuestoes } from './modulos/modulo_banco_questoes/rotasBancoQuestoes';
import type { RepositorioQuestoes } from './modulos/modulo_importacao_questoes/persistencia/repositorioQuestoes';
import { criarRotasImportacao } from './modulos/modulo_importacao_questoes/rotasImportacao';

export type DependenciasApi = {
  repositorio?: RepositorioQuestoes;
};

export function criarRouterApi(dependencias: DependenciasApi = {}) {
  const router = Router();

  router.use('/saude', rotasSaude);
  router.get('/metrics', (_req, res) => {
    res.setHeader('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    res.send(exportarMetricasPrometheus());
  });

  router.use('/importacoes', criarRotasImportacao(dependencias.repositorio));

  if (dependencias.repositorio) {
    router.use('/questoes', criarRotasBancoQuestoes(dependencias.repositorio));
  } else {
    router.use('/questoes', () => {
      throw new ErroAplicacao('PERSISTENCIA_INDISPONIVEL', 'Banco de dados nao configurado', 503);
    });
  }

  return router;
}
