/**
 * argumentosImportacao.test
 */
import { describe, expect, it } from 'vitest';
import { ErroAplicacao } from '../src/compartilhado/erros/erroAplicacao';
import { lerArgumentosImportacao } from '../src/modulos/modulo_importacao_questoes/cli/argumentosImportacao';

const argv = (...args: string[]) => ['node', 'importar-questoes.ts', ...args];

describe('argumentos de importacao', () => {
  it('le diretorio, arquivos, legados, saida e flags', () => {
    expect(
      lerArgumentosImportacao(
        argv('--dir', './provas', '-a', 'x.txt', '--arquivo', 'y.json', '--legado', 'velho.json', '--saida', 'out.json', '--persistir', '--maximo-questoes', '90')
      )
    ).toEqual({
      diretorio: './provas',
      arquivos: ['x.txt', 'y.json'],
      legados: ['velho.json'],
      saida: 'out.json',
      persistir: true,
      maximoQuestoes: 90,
      ajuda: false
    });
  });

  it('aceita ajuda sem fonte', () => {
    expect(lerArgumentosImportacao(argv('-h'))).toEqual({ arquivos: [], legados: [], persistir: false, ajuda: true });
  });

  it('rejeita argumentos invalidos', () => {
    expect(() => lerArgumentosImportacao(argv())).toThrow('Informe --dir, --arquivo ou --legado');
    expect(() => lerArgumentosImportacao(argv('--dir', 'p', '--verboso'))).toThrow('Argumento nao reconhecido: --verboso');
    expect(() => lerArgumentosImportacao(argv('--dir', 'p', '--maximo-questoes', '0'))).toThrow(
      '--maximo-questoes invalido: 0'
    );
    expect(() => lerArgumentosImportacao(argv('--saida'))).toThrow(ErroAplicacao);
  });
});
