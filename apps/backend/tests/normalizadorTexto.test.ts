/**
 * normalizadorTexto.test
 *
 * Limpeza de linhas e filtro de ruido (cabecalhos, rodapes, numeros de pagina).
 */
import { describe, expect, it } from 'vitest';
import { criarConfiguracaoExtracao } from '../src/modulos/modulo_importacao_questoes/configuracaoExtracao';
import {
  ehLinhaRuido,
  limparLinha,
  normalizarLinhas,
  paginasParaLinhas
} from '../src/modulos/modulo_importacao_questoes/normalizacao/normalizadorTexto';

const config = criarConfiguracaoExtracao();

describe('normalizador de texto', () => {
  it('troca tab, espaco rigido e &nbsp; por espaco e colapsa', () => {
    expect(limparLinha('\tQuestão  1&nbsp;texto  \r')).toBe('Questão 1 texto');
  });

  it('reconhece numeros de pagina, rodapes e cabecalhos', () => {
    expect(ehLinhaRuido('12', config)).toBe(true);
    expect(ehLinhaRuido('3 / 10', config)).toBe(true);
    expect(ehLinhaRuido('Página 4', config)).toBe(true);
    expect(ehLinhaRuido('www.exemplo.com.br', config)).toBe(true);
    expect(ehLinhaRuido('COMO PASSAR NA OAB - VOLUME 2', config)).toBe(true);
  });

  it('descarta titulos longos so em maiusculas e preserva os curtos', () => {
    expect(ehLinhaRuido('DIREITO CONSTITUCIONAL E ADMINISTRATIVO PARA A OAB', config)).toBe(true);
    expect(ehLinhaRuido('DIREITO CIVIL', config)).toBe(false);
    expect(ehLinhaRuido('Texto normal de uma questão', config)).toBe(false);
  });

  it('remove linhas vazias e de ruido', () => {
    const linhas = ['  1. Enunciado  da questão  ', '', '7', '(A)\tprimeira', 'Página 2'];
    expect(normalizarLinhas(linhas, config)).toEqual(['1. Enunciado da questão', '(A) primeira']);
  });

  it('e idempotente', () => {
    const linhas = ['  Texto com   espacos ', '15', 'www.site.com', 'Gabarito: A', '\t(B) opcao'];
    const uma = normalizarLinhas(linhas, config);
    expect(normalizarLinhas(uma, config)).toEqual(uma);
  });

  it('junta as paginas na ordem do indice', () => {
    const linhas = paginasParaLinhas([
      { fonteId: 'f', indice: 1, texto: 'segunda pagina' },
      { fonteId: 'f', indice: 0, texto: 'primeira\r\nlinha dois' }
    ]);
    expect(linhas).toEqual(['primeira', 'linha dois', 'segunda pagina']);
  });
});
