/**
 * executorImportacao.test
 *
 * Execucao completa sobre fontes em memoria: cruzamento com gabarito,
 * isolamento de falhas, deduplicacao entre fontes e relatorio.
 */
import { describe, expect, it } from 'vitest';
import { ErroPipelineFatal } from '../src/modulos/modulo_importacao_questoes/errosImportacao';
import { importarRegistrosLegados } from '../src/modulos/modulo_importacao_questoes/legado/importadorLegado';
import { executarImportacao } from '../src/modulos/modulo_importacao_questoes/pipeline/executorImportacao';
import type { FonteQuestoes } from '../src/modulos/modulo_importacao_questoes/tipos';

const ALTERNATIVAS = ['(A) alternativa um', '(B) alternativa dois', '(C) alternativa tres', '(D) alternativa quatro'];

function questao(fonteId: string, numero: number): string[] {
  return [`${numero}. Enunciado da questao ${numero} vinda da fonte ${fonteId}`, ...ALTERNATIVAS];
}

function fonteTexto(id: string, linhas: string[]): FonteQuestoes {
  return { id, lerPaginas: () => [{ fonteId: id, indice: 0, texto: linhas.join('\n') }] };
}

function fonteComQuestoes(id: string, numeros: number[], extras: string[] = []): FonteQuestoes {
  return fonteTexto(id, [...numeros.flatMap((numero) => questao(id, numero)), ...extras]);
}

describe('executor de importacao', () => {
  it('cruza questoes numeradas com a tabela de gabarito', async () => {
    const fonte = fonteComQuestoes('prova-1', [1, 2, 3, 4, 5], ['GABARITO', '1 2 3 4 5', 'A * C * B']);

    const { registros, relatorio } = await executarImportacao([fonte]);

    expect(registros.map((registro) => [registro.numero, registro.respostaCorreta])).toEqual([
      [1, 'A'],
      [2, 'REVISAR'],
      [3, 'C'],
      [4, 'REVISAR'],
      [5, 'B']
    ]);
    expect(relatorio.detalhesPorFonte['prova-1']).toEqual({
      candidatos: 5,
      rejeitados: 0,
      duplicatas: 0,
      admitidos: 5,
      entradasGabarito: 3,
      pendentesRevisao: 2
    });
    expect(relatorio.registrosPendentesRevisao).toBe(2);
    expect(relatorio.fontesSemGabarito).toEqual([]);
  });

  it('mantem a sentinela quando a letra do gabarito nao existe nas alternativas', async () => {
    const fonte = fonteComQuestoes('prova-2', [1, 2], ['Gabarito: 1-E, 2-B']);

    const { registros, relatorio } = await executarImportacao([fonte]);

    expect(registros.map((registro) => registro.respostaCorreta)).toEqual(['REVISAR', 'B']);
    expect(relatorio.gabaritosIncompativeis).toBe(1);
    expect(relatorio.registrosPendentesRevisao).toBe(1);
  });

  it('isola a falha de uma fonte e segue com as demais', async () => {
    const quebrada: FonteQuestoes = {
      id: 's2',
      lerPaginas: () => {
        throw new Error('pdf corrompido');
      }
    };

    const { registros, relatorio, etapas } = await executarImportacao([
      fonteComQuestoes('s1', [1]),
      quebrada,
      fonteComQuestoes('s3', [1])
    ]);

    expect(relatorio.fontesProcessadas).toBe(2);
    expect(relatorio.fontesComFalha).toBe(1);
    expect(relatorio.detalhesPorFonte.s2).toEqual({
      candidatos: 0,
      rejeitados: 0,
      duplicatas: 0,
      admitidos: 0,
      entradasGabarito: 0,
      pendentesRevisao: 0,
      falha: 'pdf corrompido'
    });
    expect(registros.map((registro) => registro.fonteId)).toEqual(['s1', 's3']);
    expect(relatorio.fontesSemGabarito).toEqual(['s1', 's3']);
    expect(etapas.map((etapa) => [etapa.etapa, etapa.fonteId, etapa.exito])).toEqual([
      ['leitura', 's1', true],
      ['preparo', 's1', true],
      ['deduplicacao', 's1', true],
      ['leitura', 's2', false],
      ['leitura', 's3', true],
      ['preparo', 's3', true],
      ['deduplicacao', 's3', true]
    ]);
  });

  it('admite a questao repetida entre fontes apenas pela primeira', async () => {
    const enunciado = '1. Enunciado compartilhado entre duas fontes';
    const { registros, relatorio } = await executarImportacao([
      fonteTexto('a', [enunciado, ...ALTERNATIVAS, 'Gabarito: A']),
      fonteTexto('b', [enunciado, ...ALTERNATIVAS, 'Gabarito: B'])
    ]);

    expect(registros).toHaveLength(1);
    expect(registros[0]).toMatchObject({ fonteId: 'a', respostaCorreta: 'A' });
    expect(relatorio.duplicatasDescartadas).toBe(1);
    expect(relatorio.duplicatasComRespostaDivergente).toBe(1);
    expect(relatorio.detalhesPorFonte.b).toMatchObject({ candidatos: 1, duplicatas: 1, admitidos: 0 });
  });

  it('conta rejeicoes por motivo e fontes sem questoes', async () => {
    const { relatorio } = await executarImportacao([
      fonteTexto('curta', ['1. Curta', ...ALTERNATIVAS]),
      fonteTexto('vazia', ['texto corrido sem nenhuma marcacao'])
    ]);

    expect(relatorio.candidatosEncontrados).toBe(1);
    expect(relatorio.registrosRejeitados).toBe(1);
    expect(relatorio.rejeicoesPorMotivo).toEqual({
      ENUNCIADO_INVALIDO: 1,
      ALTERNATIVAS_INVALIDAS: 0,
      RESPOSTA_INVALIDA: 0
    });
    expect(relatorio.fontesSemQuestoes).toEqual(['vazia']);
    expect(relatorio.fontesSemGabarito).toEqual([]);
    expect(relatorio.fontesProcessadas).toBe(2);
  });

  it('conta id de fonte repetido como falha da repeticao e segue', async () => {
    const { registros, relatorio } = await executarImportacao([
      fonteComQuestoes('x', [1]),
      fonteComQuestoes('x', [2]),
      fonteComQuestoes('y', [1])
    ]);

    expect(registros.map((registro) => [registro.fonteId, registro.numero])).toEqual([
      ['x', 1],
      ['y', 1]
    ]);
    expect(relatorio.fontesProcessadas).toBe(2);
    expect(relatorio.fontesComFalha).toBe(1);
    expect(relatorio.detalhesPorFonte.x).toMatchObject({ candidatos: 1, admitidos: 1 });
    expect(relatorio.detalhesPorFonte['x#2']).toEqual({
      candidatos: 0,
      rejeitados: 0,
      duplicatas: 0,
      admitidos: 0,
      entradasGabarito: 0,
      pendentesRevisao: 0,
      falha: 'Fonte repetida na mesma execucao: x'
    });
  });

  it('nao renumera a questao por item numerado do enunciado', async () => {
    const fonte = fonteTexto('locacao', [
      '1. Considere as afirmacoes sobre locacao de imoveis:',
      '2) o locador pode retomar o imovel a qualquer tempo',
      ...ALTERNATIVAS,
      '2. Segunda questao da prova sobre outro tema',
      ...ALTERNATIVAS,
      'GABARITO',
      '1 2 3',
      'A B C'
    ]);

    const { registros } = await executarImportacao([fonte]);

    expect(registros.map((registro) => [registro.numero, registro.respostaCorreta, registro.enunciado])).toEqual([
      [1, 'A', 'Considere as afirmacoes sobre locacao de imoveis: 2) o locador pode retomar o imovel a qualquer tempo'],
      [2, 'B', 'Segunda questao da prova sobre outro tema']
    ]);
  });

  it('converge enunciados iguais de varias fontes em um registro', async () => {
    const enunciado = '1. Enunciado compartilhado entre tres fontes';
    const { registros, relatorio } = await executarImportacao(
      ['a', 'b', 'c'].map((id) => fonteTexto(id, [enunciado, ...ALTERNATIVAS]))
    );

    expect(registros).toHaveLength(1);
    expect(relatorio.registrosAdmitidos).toBe(1);
    expect(relatorio.duplicatasDescartadas).toBe(2);
    expect(relatorio.duplicatasComRespostaDivergente).toBe(0);
  });

  it('aborta a execucao com erro fatal', async () => {
    const fatal: FonteQuestoes = {
      id: 'fatal',
      lerPaginas: () => {
        throw new ErroPipelineFatal('colaborador em estado invalido');
      }
    };
    await expect(executarImportacao([fatal])).rejects.toThrow('colaborador em estado invalido');

    await expect(executarImportacao([], { configuracao: { maximoQuestoes: 0 } })).rejects.toBeInstanceOf(
      ErroPipelineFatal
    );
  });

  it('consolida conjuntos legados no mesmo relatorio', async () => {
    const { registros, relatorio, etapas } = await importarRegistrosLegados([
      {
        id: 'legado:antigo',
        conteudo: {
          questoes: [
            {
              statement: 'Enunciado legado com texto suficiente',
              options: ['um', 'dois', 'tres', 'quatro'],
              answer: 'c'
            },
            'nao e objeto',
            { enunciado: 'Enunciado com poucas alternativas aqui', alternativas: ['um', 'dois', 'tres'] }
          ]
        }
      },
      { id: 'legado:quebrado', conteudo: 42 }
    ]);

    expect(registros).toHaveLength(1);
    expect(registros[0]).toMatchObject({ fonteId: 'legado:antigo', numero: 1, respostaCorreta: 'C' });
    expect(relatorio.candidatosPorFonte).toEqual({ 'legado:antigo': 3 });
    expect(relatorio.rejeicoesPorMotivo).toEqual({
      ENUNCIADO_INVALIDO: 1,
      ALTERNATIVAS_INVALIDAS: 1,
      RESPOSTA_INVALIDA: 0
    });
    expect(relatorio.fontesComFalha).toBe(1);
    expect(relatorio.detalhesPorFonte['legado:quebrado']?.falha).toBe('Conjunto legado sem lista de questoes');
    expect(etapas.map((etapa) => `${etapa.etapa}:${etapa.fonteId ?? ''}`)).toEqual([
      'leitura:legado:antigo',
      'legado:legado:antigo',
      'deduplicacao:legado:antigo',
      'leitura:legado:quebrado',
      'legado:legado:quebrado'
    ]);
  });
});
