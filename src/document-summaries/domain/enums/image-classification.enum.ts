// Tags assigned upstream by the image classifier; accepted as-is
export enum ImageClassification {
  CLINICAL_FINDING = 'clinical_finding',
  DIAGNOSTIC_IMAGING = 'diagnostic_imaging',
  CLINICAL_ALGORITHM = 'clinical_algorithm',
  ANATOMICAL_DIAGRAM = 'anatomical_diagram',
  DATA_VISUALIZATION = 'data_visualization',
  CLINICAL_DOCUMENTATION = 'clinical_documentation',
}
