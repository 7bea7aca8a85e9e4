import { SkipReason } from '../../domain/enums/result-status.enum';
import {
  cacheKeyFor,
  cleanCompanyName,
  detectSkipReason,
  simplifyName,
  toDirectDomainUrl,
} from './company-name-cleaner';

describe('company-name-cleaner', () => {
  it('cleanCompanyName colapsa espacios', () => {
    expect(cleanCompanyName('  ACME   Pvt  Ltd ')).toBe('ACME Pvt Ltd');
  });

  it.each([
    ['ACME Pvt Ltd', 'acme'],
    ['Tata Consultancy Services', 'tataconsultancy'],
    ['Infosys Limited', 'infosys'],
    ['Reliance Industries Private Limited', 'relianceindustries'],
    ['Global Services India Pvt Ltd', 'global'],
    ['Indiana Foods', 'indianafoods'],
  ])('simplifyName(%p) → %p', (name, expected) => {
    expect(simplifyName(name)).toBe(expected);
  });

  it('cacheKeyFor usa el nombre en minúsculas si la simplificación queda vacía', () => {
    expect(cacheKeyFor('ACME Pvt Ltd')).toBe('acme');
    expect(cacheKeyFor('  @#$ ')).toBe('@#$');
  });

  it.each([
    ['ab', SkipReason.NAME_TOO_SHORT],
    ['na', SkipReason.NAME_TOO_SHORT],
    ['N/A', SkipReason.GENERIC_OR_INVALID_NAME],
    ['Freelancer', SkipReason.GENERIC_OR_INVALID_NAME],
    ['ABC12345', SkipReason.LOOKS_LIKE_CODE],
    ['AB1234', SkipReason.LOOKS_LIKE_CODE],
  ])('detectSkipReason(%p) → %p', (name, reason) => {
    expect(detectSkipReason(name)).toBe(reason);
  });

  it('detectSkipReason acepta nombres normales', () => {
    expect(detectSkipReason('Acme Tools')).toBeNull();
    expect(detectSkipReason('abc12345')).toBeNull();
  });

  it('toDirectDomainUrl reconoce dominios', () => {
    expect(toDirectDomainUrl('Sulekha.com')).toBe('https://sulekha.com');
    expect(toDirectDomainUrl('foo-bar.co.in')).toBe('https://foo-bar.co.in');
    expect(toDirectDomainUrl('Acme Tools')).toBeNull();
  });
});
