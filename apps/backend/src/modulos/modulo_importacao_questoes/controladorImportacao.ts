/**
 * Controlador de importacao via API.
 *
 * Contrato:
 * - O corpo traz paginas ja extraidas (a API nao recebe PDF).
 * - `persistir: true` grava os registros admitidos; sem repositorio
 *   configurado responde 503.
 */
import type { Request, Response } from 'express';
import { ErroAplicacao } from '../../compartilhado/erros/erroAplicacao';
import { obterIdRegistrado } from '../../compartilhado/observabilidade/middlewareObservabilidade';
import type { RepositorioQuestoes } from './persistencia/repositorioQuestoes';
import { executarImportacao } from './pipeline/executorImportacao';
import type { FonteQuestoes } from './tipos';
import type { CorpoImportacao } from './validacoesImportacao';

export function fontesDoCorpo(corpo: CorpoImportacao): FonteQuestoes[] {
  return corpo.fontes.map((fonte) => ({
    id: fonte.id,
    lerPaginas: () => fonte.paginas.map((pagina) => ({ fonteId: fonte.id, indice: pagina.indice, texto: pagina.texto }))
  }));
}

export function criarControladorImportacao(repositorio?: RepositorioQuestoes) {
  async function importar(req: Request, res: Response) {
    const corpo: CorpoImportacao = req.body;
    if (corpo.persistir && !repositorio) {
      throw new ErroAplicacao('PERSISTENCIA_INDISPONIVEL', 'Banco de dados nao configurado', 503);
    }

    const { registros, relatorio } = await executarImportacao(fontesDoCorpo(corpo), {
      idExecucao: obterIdRegistrado(res)
    });

    if (corpo.persistir && repositorio) {
      const persistencia = await repositorio.salvarLote(registros);
      res.status(201).json({ relatorio, persistencia });
      return;
    }
    res.json({ relatorio, questoes: registros });
  }

  return { importar };
}
