import { getEncoding, type TiktokenEncoding } from 'js-tiktoken';
import { DEFAULT_TOKENIZER_ENCODING } from '@/constants';
import type { Tokenizer } from './types';

export const create = (encoding: TiktokenEncoding = DEFAULT_TOKENIZER_ENCODING): Tokenizer => {
    // Loading the rank table is the expensive part; defer it to first use
    let encoder: ReturnType<typeof getEncoding> | null = null;
    const getEncoder = () => {
        if (!encoder) {
            encoder = getEncoding(encoding);
        }
        return encoder;
    };

    return {
        encode: (text) => getEncoder().encode(text),
        decode: (tokens) => getEncoder().decode(tokens),
    };
};
