/**
 * Sample interchanges shared by the codec tests.
 */

/** 106-character 00501 header: repetition separator "^", component separator ":" */
export const ISA_00501 =
  'ISA*00*          *00*          *ZZ*SENDER         *ZZ*RECEIVER       *240305*1230*^*00501*000000001*0*P*:~';

/** 00401 header: ISA11 is the standards identifier "U", component separator ">" */
export const ISA_00401 =
  'ISA*00*          *00*          *ZZ*SENDER         *ZZ*RECEIVER       *240305*1230*U*00401*000000002*0*P*>~';

export const SAMPLE_X12 =
  ISA_00501 +
  'GS*HC*SENDERAPP*RECEIVERAPP*20240305*1230*1*X*005010X222A1~' +
  'ST*837*0001~' +
  'NM1*85*2*CLINIC^LAB~' +
  'SV1*HC:99213:25*125.00~' +
  'SE*4*0001~' +
  'GE*1*1~' +
  'IEA*1*000000001~';

export const SAMPLE_SEGMENT_IDS = ['ISA', 'GS', 'ST', 'NM1', 'SV1', 'SE', 'GE', 'IEA'];
