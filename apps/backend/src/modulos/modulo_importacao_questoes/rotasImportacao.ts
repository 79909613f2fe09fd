/**
 * Rotas de importacao de questoes.
 */
import { Router } from 'express';
import { validarCorpo } from '../../compartilhado/validacoes/validar';
import type { RepositorioQuestoes } from './persistencia/repositorioQuestoes';
import { criarControladorImportacao } from './controladorImportacao';
import { esquemaImportacao } from './validacoesImportacao';

export function criarRotasImportacao(repositorio?: RepositorioQuestoes) {
  const router = Router();
  const controlador = criarControladorImportacao(repositorio);

  router.post('/', validarCorpo(esquemaImportacao), controlador.importar);

  return router;
}
