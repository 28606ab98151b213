/** Input-schema descriptions for commonly configured registry columns */
export const FIELD_DESCRIPTIONS: Readonly<Record<string, string>> = {
    name: 'First name to search (partial match, case-insensitive)',
    surname: 'Last name to search (partial match, case-insensitive)',
    cpf: 'CPF number to search (Brazilian ID document)',
    phone: 'Phone number to search',
    city: 'City name to search (partial match, case-insensitive)',
    state: 'State abbreviation (e.g., SP, RJ, MG)',
    address: 'Street address to search',
};

export function describeField(field: string): string {
    if (Object.hasOwn(FIELD_DESCRIPTIONS, field)) {
        return FIELD_DESCRIPTIONS[field];
    }
    return `${field.charAt(0).toUpperCase()}${field.slice(1)} field`;
}
