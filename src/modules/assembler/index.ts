import { Resolution, ResolutionResult } from '../../types';
import { TextUtils } from '../../utils/text';

export class ResultAssembler {

    constructor(private readonly sentinel: string) { }

    assemble(resolution: Resolution): ResolutionResult {
        return {
            remainder: this.remainderOf(resolution.address),
            province: resolution.province?.name ?? '',
            district: resolution.district?.name ?? '',
            ward: resolution.ward?.name ?? ''
        };
    }

    remainderOf(address: string): string {
        const text = address.endsWith(this.sentinel) ? address.slice(0, address.length - this.sentinel.length) : address;
        return TextUtils.removeSpareSpace(text);
    }

    // Separators stay even when a level is blank.
    static format(result: ResolutionResult): string {
        return `${result.remainder} ${result.ward}, ${result.district}, ${result.province}`;
    }
}
